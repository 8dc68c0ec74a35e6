import { describe, it, expect } from "vitest";
import { ValidationError } from "../errors.js";
import { DEFAULT_IMAGE_CONFIG, parseAspectRatio, resolveImageConfig } from "../generation/imageConfig.js";

describe("imageConfig", () => {
  it("parses ratios and names", () => {
    expect(parseAspectRatio("16:9")).toBe("16:9");
    expect(parseAspectRatio("wide")).toBe("16:9");
    expect(parseAspectRatio("Portrait")).toBe("2:3");
    expect(parseAspectRatio(" 1:1 ")).toBe("1:1");
  });

  it("lists the valid options when a ratio is unknown", () => {
    expect(() => parseAspectRatio("4:3")).toThrow(ValidationError);
    expect(() => parseAspectRatio("4:3")).toThrow("Invalid aspect ratio: 4:3. Valid options: 2:3, 3:2, 1:1, 16:9, 9:16");
  });

  it("layers config with later layers winning", () => {
    expect(resolveImageConfig()).toEqual(DEFAULT_IMAGE_CONFIG);
    expect(resolveImageConfig({ model: "m1", aspectRatio: "3:2" }, undefined, { aspectRatio: "9:16" })).toEqual({
      model: "m1",
      aspectRatio: "9:16",
      responseModalities: ["IMAGE"]
    });
  });
});

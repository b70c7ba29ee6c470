import { describe, expect, it } from "vitest";
import { platformFromNodePlatform } from "../platform";

describe("platformFromNodePlatform", () => {
  it("maps win32 to the windows family", () => {
    expect(platformFromNodePlatform("win32")).toBe("windows");
  });

  it("treats every other platform as posix", () => {
    expect(platformFromNodePlatform("linux")).toBe("posix");
    expect(platformFromNodePlatform("darwin")).toBe("posix");
    expect(platformFromNodePlatform("freebsd")).toBe("posix");
  });
});

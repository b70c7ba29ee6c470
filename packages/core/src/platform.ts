export type Platform = "windows" | "posix";

export function platformFromNodePlatform(nodePlatform: NodeJS.Platform): Platform {
  return nodePlatform === "win32" ? "windows" : "posix";
}

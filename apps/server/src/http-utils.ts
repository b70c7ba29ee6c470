import { ServerResponse } from "node:http";

export function sendText(
  res: ServerResponse,
  status: number,
  message: string,
  headers: Record<string, string> = {}
): void {
  const body = `${message}\n`;
  res.writeHead(status, {
    ...headers,
    "content-type": "text/plain; charset=utf-8",
    "x-content-type-options": "nosniff",
    "content-length": Buffer.byteLength(body)
  });
  res.end(body);
}

/**
 * Writes the image bytes untouched. Returns false when the client is already
 * gone; the response is then left as is.
 */
export function sendPng(res: ServerResponse, image: Buffer): boolean {
  if (res.destroyed || res.writableEnded) {
    return false;
  }
  res.writeHead(200, {
    "content-type": "image/png",
    "content-length": image.length
  });
  res.end(image);
  return true;
}

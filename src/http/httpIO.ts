import type { IncomingMessage, ServerResponse } from "http";

export type HttpResponse = {
  status: number;
  body?: unknown;
};

export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const maxBodyBytes = 10 * 1024 * 1024;

export const corsHeaders = {
  "access-control-allow-origin": "*",
  "access-control-allow-methods": "GET, POST, OPTIONS",
  "access-control-allow-headers": "Content-Type"
} as const;

export const readBody = (req: IncomingMessage, limit = maxBodyBytes): Promise<string> =>
  new Promise<string>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;

    req.on("data", (chunk: Buffer) => {
      if (tooLarge) return;
      size += chunk.length;
      if (size > limit) {
        tooLarge = true;
        reject(new HttpError(413, "request body too large"));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      if (!tooLarge) resolve(Buffer.concat(chunks).toString("utf8"));
    });
    req.on("error", reject);
  });

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Parses a JSON object body. An empty body reads as `{}` so that the route can
 * report which field is missing.
 */
export const parseJsonObject = (text: string): Record<string, unknown> => {
  if (text.trim() === "") return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new HttpError(400, "invalid JSON body");
  }
  return isRecord(parsed) ? parsed : {};
};

export const sendJson = (res: ServerResponse, response: HttpResponse): void => {
  if (response.body === undefined) {
    res.writeHead(response.status, { ...corsHeaders });
    res.end();
    return;
  }
  res.writeHead(response.status, { "content-type": "application/json", ...corsHeaders });
  res.end(JSON.stringify(response.body));
};

import axios, { AxiosInstance } from "axios";
import { Attachment } from "./submission";
import { ValidationError, errorMessage } from "./errors";

const DATA_URI_PATTERN = /^data:([^,]*),(.*)$/s;
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const MAX_DOWNLOAD_BYTES = 20 * 1024 * 1024;

export interface DecodedDataUri {
  mimeType: string;
  data: Buffer;
}

export type HttpGetter = Pick<AxiosInstance, "get">;

/**
 * Decode a data URI. Both base64 and percent-encoded payloads are accepted.
 */
export function decodeDataUri(uri: string): DecodedDataUri {
  const match = DATA_URI_PATTERN.exec(uri);
  if (!match) {
    throw new ValidationError("Malformed data URI");
  }

  const params = match[1].split(";");
  const payload = match[2];
  const isBase64 = params[params.length - 1].toLowerCase() === "base64";
  const mimeType = params[0] || "text/plain";

  if (isBase64) {
    const cleaned = payload.replace(/\s+/g, "");
    if (!BASE64_PATTERN.test(cleaned)) {
      throw new ValidationError("Data URI payload is not valid base64");
    }
    return { mimeType, data: Buffer.from(cleaned, "base64") };
  }

  try {
    return { mimeType, data: Buffer.from(decodeURIComponent(payload), "utf-8") };
  } catch {
    throw new ValidationError("Data URI payload is not valid percent-encoding");
  }
}

/**
 * Turns request attachments into file contents keyed by attachment name.
 * Inline data URIs are decoded; http(s) URLs are downloaded.
 */
export class AttachmentDecoder {
  private http: HttpGetter;
  private timeoutMs: number;

  constructor(options: { http?: HttpGetter; timeoutMs?: number } = {}) {
    this.http = options.http ?? axios;
    this.timeoutMs = options.timeoutMs ?? 20_000;
  }

  async decodeAll(attachments: Attachment[]): Promise<Map<string, Buffer>> {
    const files = new Map<string, Buffer>();

    for (const attachment of attachments) {
      if (files.has(attachment.name)) {
        throw new ValidationError(`Duplicate attachment name "${attachment.name}"`);
      }
      files.set(attachment.name, await this.decode(attachment));
    }

    return files;
  }

  async decode(attachment: Attachment): Promise<Buffer> {
    if (attachment.url.toLowerCase().startsWith("data:")) {
      try {
        return decodeDataUri(attachment.url).data;
      } catch (error) {
        throw new ValidationError(`Attachment "${attachment.name}": ${errorMessage(error)}`);
      }
    }
    return this.download(attachment);
  }

  private async download(attachment: Attachment): Promise<Buffer> {
    try {
      const response = await this.http.get<ArrayBuffer>(attachment.url, {
        responseType: "arraybuffer",
        timeout: this.timeoutMs,
        maxContentLength: MAX_DOWNLOAD_BYTES,
      });
      return Buffer.from(response.data);
    } catch (error) {
      throw new ValidationError(
        `Could not download attachment "${attachment.name}": ${errorMessage(error)}`
      );
    }
  }
}

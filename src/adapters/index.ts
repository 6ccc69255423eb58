import path from "path";
import { promises as fs } from "fs";
import { SourceDecodeError, UnsupportedInputError } from "../errors";
import { AdapterOutput } from "../pipeline";
import { readTxt } from "./txt";
import { readDocx } from "./docx";
import { readPdf } from "./pdf";
import { readUrl } from "./url";

export { readTxt } from "./txt";
export { readDocx } from "./docx";
export { readPdf } from "./pdf";
export { readUrl, stripMarkup, DEFAULT_FETCH_TIMEOUT_MS } from "./url";

export type TextSourceInput =
  | { kind: "text"; text: string }
  | { kind: "bytes"; data: Uint8Array; fileName?: string }
  | { kind: "url"; url: string };

export type LoadOptions = {
  fetchTimeoutMs?: number;
};

const SUPPORTED_EXTENSIONS = [".txt", ".md", ".docx", ".pdf"] as const;

const urlPattern = /^https?:\/\//i;

export function isUrl(value: string): boolean {
  return urlPattern.test(value);
}

export async function readBytes(data: Uint8Array, fileName?: string): Promise<AdapterOutput> {
  const origin = fileName ?? "uploaded file";
  const extension = fileName ? path.extname(fileName.toLowerCase()) : "";

  if (extension === "" || extension === ".txt" || extension === ".md") {
    return readTxt(data, origin);
  }
  if (extension === ".docx") {
    return readDocx(data, origin);
  }
  if (extension === ".pdf") {
    return readPdf(data, origin);
  }

  const supportedList = SUPPORTED_EXTENSIONS.join(", ");
  throw new UnsupportedInputError(
    `Unsupported input extension: ${extension}. Supported extensions: ${supportedList}`,
  );
}

export async function loadSource(
  input: TextSourceInput,
  options: LoadOptions = {},
): Promise<AdapterOutput> {
  switch (input.kind) {
    case "text":
      return { kind: "text", text: input.text, meta: { origin: "literal text" } };
    case "bytes":
      return readBytes(input.data, input.fileName);
    case "url":
      return readUrl(input.url, { timeoutMs: options.fetchTimeoutMs });
  }
}

/**
 * Maps a command-line source argument to an input: URLs are fetched, anything
 * else is read from disk as uploaded bytes.
 */
export async function resolveSource(source: string): Promise<TextSourceInput> {
  if (isUrl(source)) {
    return { kind: "url", url: source };
  }

  let data: Buffer;
  try {
    data = await fs.readFile(source);
  } catch (error) {
    throw new SourceDecodeError(`Could not read ${source}`, { cause: error });
  }
  return { kind: "bytes", data, fileName: path.basename(source) };
}

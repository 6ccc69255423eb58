import * as cheerio from "cheerio";
import { SourceFetchError } from "../errors";
import { AdapterOutput } from "../pipeline";

export const DEFAULT_FETCH_TIMEOUT_MS = 15_000;

const hiddenElements = "script, style, noscript, template, iframe, svg";
const blockElements = [
  "address",
  "article",
  "aside",
  "blockquote",
  "dd",
  "div",
  "dl",
  "dt",
  "figcaption",
  "figure",
  "footer",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "header",
  "hr",
  "li",
  "main",
  "nav",
  "ol",
  "p",
  "pre",
  "section",
  "table",
  "td",
  "th",
  "title",
  "tr",
  "ul",
].join(", ");

/**
 * Reduces an HTML document to its visible text, one line per block-level element.
 */
export function stripMarkup(html: string): string {
  const $ = cheerio.load(html);
  $(hiddenElements).remove();
  $("br").replaceWith("\n");
  $(blockElements).each((_, element) => {
    $(element).prepend("\n").append("\n");
  });

  return $.root()
    .text()
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter(Boolean)
    .join("\n");
}

export async function readUrl(
  url: string,
  options: { timeoutMs?: number } = {},
): Promise<AdapterOutput> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;

  let response: Response;
  try {
    response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    const reason =
      error instanceof Error && error.name === "TimeoutError"
        ? `timed out after ${timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
    throw new SourceFetchError(url, `Failed to fetch ${url}: ${reason}`, { cause: error });
  }

  if (!response.ok) {
    throw new SourceFetchError(url, `Failed to fetch ${url}: HTTP ${response.status}`, {
      status: response.status,
    });
  }

  let body: string;
  try {
    body = await response.text();
  } catch (error) {
    throw new SourceFetchError(url, `Failed to read response body from ${url}`, { cause: error });
  }
  const contentType = response.headers.get("content-type") ?? "";
  const isHtml = contentType.includes("html") || (!contentType && /^\s*</.test(body));

  return {
    kind: "text",
    text: isHtml ? stripMarkup(body) : body,
    meta: {
      origin: url,
    },
  };
}

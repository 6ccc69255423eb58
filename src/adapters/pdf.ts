import pdfParse from "pdf-parse";
import { SourceDecodeError } from "../errors";
import { AdapterOutput } from "../pipeline";

export async function readPdf(data: Uint8Array, origin: string): Promise<AdapterOutput> {
  try {
    const result = await pdfParse(Buffer.from(data));
    return {
      kind: "text",
      text: result.text,
      meta: {
        origin,
      },
    };
  } catch (error) {
    throw new SourceDecodeError(`Could not read PDF text from ${origin}`, { cause: error });
  }
}

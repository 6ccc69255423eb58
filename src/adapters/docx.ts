import mammoth from "mammoth";
import { SourceDecodeError } from "../errors";
import { AdapterOutput } from "../pipeline";

export async function readDocx(data: Uint8Array, origin: string): Promise<AdapterOutput> {
  try {
    const result = await mammoth.extractRawText({ buffer: Buffer.from(data) });
    return {
      kind: "text",
      text: result.value,
      meta: {
        origin,
      },
    };
  } catch (error) {
    throw new SourceDecodeError(`Could not read DOCX text from ${origin}`, { cause: error });
  }
}

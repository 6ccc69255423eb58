import { SourceDecodeError } from "../errors";
import { AdapterOutput } from "../pipeline";

export function readTxt(data: Uint8Array, origin: string): AdapterOutput {
  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(data);
  } catch (error) {
    throw new SourceDecodeError(`${origin} is not valid UTF-8 text`, { cause: error });
  }
  return {
    kind: "text",
    text,
    meta: {
      origin,
    },
  };
}

export function normalize(input: string): string {
  return input.replace(/\r\n?/g, "\n");
}

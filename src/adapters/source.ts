import type { ToonValue } from "../value";

/** A parsed source and, for tabular formats, the size proxy measured before parsing. */
export interface ParsedSource {
  readonly value: ToonValue;
  readonly sizeProxy?: number;
}

export const expectText = (input: unknown, format: string): string => {
  if (typeof input !== "string") {
    throw new TypeError(`${format} input must be a string, received ${typeof input}`);
  }
  return input;
};

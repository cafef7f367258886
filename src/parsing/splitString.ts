import { FormatError } from "@/errors";

/**
 * Split a string on a delimiter, reading fields the way a line reader does:
 * a trailing delimiter does not produce a final empty field, and an empty
 * input produces no fields at all.
 *
 * @param text - String to split
 * @param delimiter - Non-empty separator
 * @param skipEmpty - Drop empty fields (default: true)
 * @returns Ordered fields between delimiters
 */
export function splitString(text: string, delimiter: string, skipEmpty: boolean = true): string[] {
  if (delimiter.length === 0) {
    throw new FormatError("Delimiter must not be empty", text);
  }

  const fields = text.split(delimiter);
  if (fields[fields.length - 1] === "") {
    fields.pop();
  }

  return skipEmpty ? fields.filter((field) => field.length > 0) : fields;
}

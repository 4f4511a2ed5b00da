/**
 * BibtexParser: Adapter from @retorquere/bibtex-parser to the flat entries the verifier needs.
 *
 * The library recovers from malformed entries and reports them in `errors`,
 * so one broken entry never hides the others.
 */

import { parse } from "@retorquere/bibtex-parser";
import { BibliographyParseError, errorMessage } from "../errors";

export interface BibliographyEntry {
  key: string;
  type: string;
  title: string;
  author: string;
  fields: Record<string, string>;
}

export interface ParsedBibliography {
  entries: BibliographyEntry[];
  /** One message per entry or block the parser could not read */
  errors: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringProp(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === "string" ? value.trim() : "";
}

/** "Last, First" for a parsed creator, or its literal name */
function creatorName(creator: Record<string, unknown>): string {
  const literal = stringProp(creator, "name");
  if (literal) return literal;
  const last = [stringProp(creator, "prefix"), stringProp(creator, "lastName")].filter(Boolean).join(" ");
  const first = stringProp(creator, "firstName");
  return first ? `${last}, ${first}` : last;
}

function fieldText(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number") return String(value);
  if (!Array.isArray(value)) return "";
  if (value.length > 0 && value.every(isRecord)) {
    return value.map(creatorName).filter(Boolean).join(" and ");
  }
  return value.map(fieldText).filter(Boolean).join(", ");
}

function describeParseError(error: unknown): string {
  if (isRecord(error)) {
    const text = stringProp(error, "error") || stringProp(error, "message");
    if (text) return text;
  }
  return errorMessage(error);
}

/**
 * Parse BibTeX source into entries, in file order, with field names lower-cased.
 * Throws BibliographyParseError only when the parser gives up on the whole source.
 */
export function parseBibtex(source: string): ParsedBibliography {
  let library: ReturnType<typeof parse>;
  try {
    library = parse(source);
  } catch (err) {
    throw BibliographyParseError.unreadable(errorMessage(err));
  }

  const entries = library.entries.map(entry => {
    const fields: Record<string, string> = {};
    for (const [name, value] of Object.entries(entry.fields)) {
      const text = fieldText(value);
      if (text) fields[name.toLowerCase()] = text;
    }
    return {
      key: entry.key,
      type: entry.type.toLowerCase(),
      title: fields.title ?? "",
      author: fields.author ?? "",
      fields,
    };
  });

  return { entries, errors: library.errors.map(describeParseError) };
}

/** Citation keys defined by the entries; a duplicated key is listed once. */
export function bibliographyKeys(entries: BibliographyEntry[]): Set<string> {
  return new Set(entries.map(e => e.key));
}

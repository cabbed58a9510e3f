// CHANGE: Parse the leading docblock of Typecho entry files into flat metadata.
// WHY: Plugin.php and theme index.php carry @package/@author/@version/@link tags in their first comment.

import { ExtractedMetadata } from "./types.js";

const DOCBLOCK_SCAN_CHARS = 8000;
const CLASS_SCAN_CHARS = 16000;

const TAG_PATTERNS = [
  ["package", /^@package\s+(.+)/i],
  ["author", /^@author\s+(.+)/i],
  ["version", /^@version\s+(.+)/i],
  ["link", /^@link\s+(.+)/i]
] as const;

type TagName = (typeof TAG_PATTERNS)[number][0];

const PLUGIN_CLASS = /\bclass\s+([A-Za-z0-9_]+)_Plugin\b/;
const DOTTED_VERSION = /(\d+\.\d+(?:\.\d+)?)/;

export const EMPTY_METADATA: ExtractedMetadata = {
  package: "",
  author: "",
  version: "",
  link: "",
  description: ""
};

/**
 * Leading `count` code points of text. Characters outside the BMP count once.
 */
export function leadingCodePoints(text: string, count: number): string {
  if (text.length <= count) {
    return text;
  }
  let end = 0;
  let seen = 0;
  for (const char of text) {
    if (seen === count) {
      break;
    }
    end += char.length;
    seen += 1;
  }
  return text.slice(0, end);
}

/**
 * Locate the first `/** ... *\/` block near the top of a file.
 *
 * @param text - Raw file contents.
 * @returns The block including its delimiters, or an empty string.
 */
export function firstDocblock(text: string): string {
  const head = leadingCodePoints(text, DOCBLOCK_SCAN_CHARS);
  const start = head.indexOf("/**");
  if (start === -1) {
    return "";
  }
  const end = head.indexOf("*/", start);
  if (end === -1) {
    return "";
  }
  return head.slice(start, end + 2);
}

/**
 * Strip comment delimiters and leading asterisks from each docblock line.
 */
export function docblockLines(doc: string): string[] {
  return doc.split(/\r\n|\r|\n/).map(raw => {
    let line = raw.trim();
    if (line.startsWith("/**")) {
      line = line.slice(3);
    }
    if (line.endsWith("*/")) {
      line = line.slice(0, -2);
    }
    return line.replace(/^\*+/, "").trim();
  });
}

function firstDescriptionLine(lines: readonly string[]): string {
  return lines.find(line => line !== "" && !line.startsWith("@"))?.trim() ?? "";
}

/**
 * Read recognised tags from a docblock. The first occurrence of each tag wins.
 *
 * @param doc - Docblock text as returned by {@link firstDocblock}.
 * @returns Metadata with the description taken from the first untagged line.
 */
export function parseDocblock(doc: string): ExtractedMetadata {
  const lines = docblockLines(doc);
  const tags: Record<TagName, string> = { package: "", author: "", version: "", link: "" };
  for (const line of lines) {
    for (const [name, pattern] of TAG_PATTERNS) {
      const match = pattern.exec(line);
      if (match && !tags[name]) {
        tags[name] = match[1].trim();
        break;
      }
    }
  }
  return { ...tags, description: firstDescriptionLine(lines) };
}

/**
 * Find the `<Prefix>` of a `class <Prefix>_Plugin` declaration.
 *
 * @param text - Raw plugin source.
 * @returns The prefix, or an empty string when no plugin class is declared.
 */
export function extractClassPrefix(text: string): string {
  const match = PLUGIN_CLASS.exec(leadingCodePoints(text, CLASS_SCAN_CHARS));
  return match ? match[1].trim() : "";
}

/**
 * Reduce a free-form version tag to a dotted version.
 *
 * @param raw - Value of an `@version` tag.
 * @returns First `x.y` or `x.y.z` sequence, otherwise a conservatively filtered copy of the input.
 */
export function cleanVersion(raw: string): string {
  const value = raw.trim();
  if (!value) {
    return "";
  }
  const match = DOTTED_VERSION.exec(value);
  if (match) {
    return match[1];
  }
  return value
    .replace(/^[vV]+/, "")
    .replace(/_/g, ".")
    .replace(/[^0-9A-Za-z.+-]/g, "");
}

/**
 * Extract metadata from the first docblock of an entry file.
 */
export function extractMetadata(text: string): ExtractedMetadata {
  const doc = firstDocblock(text);
  return doc ? parseDocblock(doc) : { ...EMPTY_METADATA };
}

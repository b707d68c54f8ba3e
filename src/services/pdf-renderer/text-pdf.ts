import { Effect } from "effect";
import PDFDocument from "pdfkit";
import { RenderError } from "../../lib/errors.js";

export const PLACEHOLDER_TEXT = "PDF creation failed due to encoding issues.";

// Typographic characters the standard PDF fonts cannot show, and their ASCII
// stand-ins
const ASCII_SUBSTITUTES: ReadonlyMap<string, string> = new Map([
  ["\u2014", "-"], // em dash
  ["\u2013", "-"], // en dash
  ["\u2012", "-"],
  ["\u2010", "-"],
  ["\u2011", "-"],
  ["\u201c", '"'],
  ["\u201d", '"'],
  ["\u201e", '"'],
  ["\u2018", "'"],
  ["\u2019", "'"],
  ["\u201a", "'"],
  ["\u2026", "..."],
  ["\u00a0", " "],
  ["\u2022", "*"],
]);

// Zero-width space, non-joiner, joiner, word joiner and byte order mark
const ZERO_WIDTH = new Set(["\u200b", "\u200c", "\u200d", "\u2060", "\ufeff"]);

const COMBINING_MARKS = /[\u0300-\u036f]/g;

const isAscii = (value: string): boolean => /^[\x00-\x7f]*$/.test(value);

const toAsciiChar = (char: string): string => {
  if (char.charCodeAt(0) <= 0x7f) return char;
  const substitute = ASCII_SUBSTITUTES.get(char);
  if (substitute !== undefined) return substitute;
  if (ZERO_WIDTH.has(char)) return "";

  const decomposed = char.normalize("NFKD").replace(COMBINING_MARKS, "");
  return isAscii(decomposed) ? decomposed : "?";
};

/**
 * Map text onto the ASCII range the built-in PDF fonts can show: known
 * typography becomes its closest ASCII form, zero-width characters vanish,
 * accented letters lose their accents and anything else becomes "?".
 */
export const toPdfSafeText = (text: string): string =>
  Array.from(text, toAsciiChar).join("");

/**
 * Blind ASCII re-encoding: every non-ASCII code point becomes "?"
 */
export const toAsciiReplaced = (text: string): string =>
  Array.from(text, (char) => (char.charCodeAt(0) <= 0x7f ? char : "?")).join(
    "",
  );

/**
 * Lay text out on A4 pages in 12pt Helvetica with default margins
 */
export const layoutTextPdf = (
  text: string,
): Effect.Effect<Uint8Array, RenderError> =>
  Effect.async<Uint8Array, RenderError>((resume) => {
    const doc = new PDFDocument({ size: "A4", margin: 72 });
    const chunks: Buffer[] = [];

    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resume(Effect.succeed(Buffer.concat(chunks))));
    doc.on("error", (error: Error) =>
      resume(
        Effect.fail(
          new RenderError({
            message: `Text PDF layout failed: ${error.message}`,
            cause: error,
          }),
        ),
      ),
    );

    try {
      doc.font("Helvetica").fontSize(12).text(text);
      doc.end();
    } catch (error) {
      resume(
        Effect.fail(
          new RenderError({
            message: `Text PDF layout failed: ${error}`,
            cause: error,
          }),
        ),
      );
    }
  });

import * as cheerio from "cheerio";
import { decodeHTML } from "entities";

type Substitution = readonly [pattern: RegExp, replacement: string];

const open = (tag: string): RegExp => new RegExp(`<${tag}\\b[^>]*>`, "gi");
const close = (tag: string): RegExp => new RegExp(`<\\/${tag}\\s*>`, "gi");

// Order matters: markers are inserted before the remaining tags are stripped
const TAG_SUBSTITUTIONS: readonly Substitution[] = [
  [open("br"), "\n"],
  [open("p"), "\n\n"],
  [close("p"), "\n"],
  [open("div"), "\n\n"],
  [close("div"), "\n"],
  [open("h[1-6]"), "\n\n"],
  [close("h[1-6]"), "\n"],
  [open("li"), "\n• "],
  [close("li"), ""],
  [open("ul"), "\n"],
  [close("ul"), "\n"],
  [open("ol"), "\n"],
  [close("ol"), "\n"],
  [open("strong"), "**"],
  [close("strong"), "**"],
  [open("b"), "**"],
  [close("b"), "**"],
  [open("em"), "*"],
  [close("em"), "*"],
  [open("i"), "*"],
  [close("i"), "*"],
  [open("u"), "_"],
  [close("u"), "_"],
  [/<a\b[^>]*href="([^"]*)"[^>]*>/gi, "[$1]"],
  [close("a"), ""],
  [open("blockquote"), "\n> "],
  [close("blockquote"), "\n"],
  [open("hr"), `\n${"-".repeat(40)}\n`],
  [open("table"), "\n"],
  [close("table"), "\n"],
  [open("tr"), "\n"],
  [close("tr"), "\n"],
  [open("td"), " | "],
  [close("td"), ""],
  [open("th"), " | "],
  [close("th"), ""],
];

const ANY_TAG = /<[^>]+>/g;

/**
 * Replace structural tags with plain-text markers, then drop every other tag
 */
export const replaceTags = (html: string): string =>
  TAG_SUBSTITUTIONS.reduce(
    (content, [pattern, replacement]) => content.replace(pattern, replacement),
    html,
  ).replace(ANY_TAG, "");

const BLANK_LINE_RUN = /\n\s*\n\s*\n/g;

export const normalizeWhitespace = (text: string): string =>
  text
    .replace(BLANK_LINE_RUN, "\n\n")
    .replace(/ +/g, " ")
    .replace(/\t+/g, "    ")
    .replace(BLANK_LINE_RUN, "\n\n")
    .trim();

/**
 * Render an HTML body as readable plain text, roughly the way a mail client
 * would show it without styling.
 */
export const renderHtmlAsText = (html: string): string => {
  const $ = cheerio.load(html, null, false);
  $("script, style").remove();

  const decoded = decodeHTML($.html());
  return normalizeWhitespace(replaceTags(decoded));
};

import { Option } from "effect";
import { EmailSource, type MessageDate } from "./type.js";

const NO_NAME_PREFIX = "NoName";
const PREFIX_WORD_LIMIT = 3;

/**
 * Build the output name fragment from an input file's base name (extension
 * already stripped): the first three whitespace-separated words joined with
 * underscores, with everything but letters, digits and underscores removed.
 */
export const extractFilenamePrefix = (baseName: string): string => {
  const words = baseName.split(/\s+/).filter((word) => word.length > 0);
  if (words.length === 0) {
    return NO_NAME_PREFIX;
  }

  const prefix = words
    .slice(0, PREFIX_WORD_LIMIT)
    .join("_")
    .replace(/[^\p{L}\p{N}_]/gu, "");

  return prefix.length > 0 ? prefix : NO_NAME_PREFIX;
};

const pad = (value: number, width = 2): string =>
  value.toString().padStart(width, "0");

/**
 * Format a message date as YYYY-MM-DD on the sender's own calendar, i.e. in
 * the offset the Date header was written in.
 */
export const formatDateStamp = (date: MessageDate): string => {
  const local = new Date(date.instant.getTime() + date.offsetMinutes * 60_000);
  return `${pad(local.getUTCFullYear(), 4)}-${pad(local.getUTCMonth() + 1)}-${pad(local.getUTCDate())}`;
};

export const buildPdfFileName = (
  dateStamp: string,
  prefix: string,
  counter = 0,
): string =>
  counter > 0
    ? `${dateStamp}_Email_${prefix}_${counter}.pdf`
    : `${dateStamp}_Email_${prefix}.pdf`;

/**
 * Resolve the input format from a file name's extension (case-insensitive)
 */
export const sourceFromPath = (filePath: string): Option.Option<EmailSource> => {
  const lower = filePath.toLowerCase();
  if (lower.endsWith(".eml")) {
    return Option.some(EmailSource.EmlSource({ path: filePath }));
  }
  if (lower.endsWith(".msg")) {
    return Option.some(EmailSource.MsgSource({ path: filePath }));
  }
  return Option.none();
};


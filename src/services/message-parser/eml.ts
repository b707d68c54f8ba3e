import { Effect, Option } from "effect";
import { type AddressObject, type ParsedMail, simpleParser } from "mailparser";
import { ParseError } from "../../lib/errors.js";
import {
  type AttachmentDescriptor,
  MessageDefaults,
  type NormalizedMessage,
} from "../../lib/type.js";
import { parseEmailDate } from "./date.js";

const addressText = (
  value: AddressObject | AddressObject[] | undefined,
): string | undefined => {
  if (value === undefined) return undefined;
  const text = (Array.isArray(value) ? value : [value])
    .map((address) => address.text)
    .filter((entry) => entry.length > 0)
    .join(", ");
  return text.length > 0 ? text : undefined;
};

/**
 * Raw text of the first header with the given name, unfolded
 */
const rawHeader = (mail: ParsedMail, name: string): string | undefined => {
  const header = mail.headerLines.find((entry) => entry.key === name);
  if (!header) return undefined;
  const value = header.line.slice(header.line.indexOf(":") + 1);
  const unfolded = value.replace(/\r?\n[ \t]+/g, " ").trim();
  return unfolded.length > 0 ? unfolded : undefined;
};

const extractAttachments = (mail: ParsedMail): AttachmentDescriptor[] =>
  mail.attachments.map((attachment) => ({
    fileName: attachment.filename ?? "unnamed",
    size: attachment.size,
    contentType: attachment.contentType || "application/octet-stream",
  }));

// ============================================================================
// Body selection
// ============================================================================

export interface MessageBodies {
  readonly text: Option.Option<string>;
  readonly html: Option.Option<string>;
}

const noBodies: MessageBodies = { text: Option.none(), html: Option.none() };

const parserOptions = {
  skipHtmlToText: true,
  skipTextToHtml: true,
  skipImageLinks: true,
  skipTextLinks: true,
} as const;

const parseMime = (content: Uint8Array, path: string) =>
  Effect.tryPromise({
    try: () => simpleParser(Buffer.from(content), parserOptions),
    catch: (error) =>
      new ParseError({
        message: `Failed to parse EML file: ${error}`,
        path,
        cause: error,
      }),
  });

const multipartBoundary = (mail: ParsedMail): string | undefined => {
  const header = mail.headers.get("content-type");
  if (
    typeof header !== "object" ||
    Array.isArray(header) ||
    header instanceof Date ||
    !("params" in header)
  ) {
    return undefined;
  }
  return header.value.toLowerCase().startsWith("multipart/")
    ? header.params.boundary
    : undefined;
};

/**
 * Raw body parts of a multipart entity, in order. Text is latin1 so each
 * character maps back to exactly one byte.
 */
const splitMultipart = (raw: string, boundary: string): string[] => {
  const headerEnd = /\r?\n\r?\n/.exec(raw);
  if (!headerEnd) return [];
  const body = raw.slice(headerEnd.index + headerEnd[0].length);

  const parts: string[] = [];
  let current: string[] | undefined;
  for (const line of body.split(/\r?\n/)) {
    const marker = line.trimEnd();
    if (marker === `--${boundary}--`) {
      if (current) parts.push(current.join("\r\n"));
      return parts;
    }
    if (marker === `--${boundary}`) {
      if (current) parts.push(current.join("\r\n"));
      current = [];
      continue;
    }
    current?.push(line);
  }
  if (current) parts.push(current.join("\r\n"));
  return parts;
};

/**
 * First text/plain and first text/html leaf, in document order. Parts the
 * parser files as attachments carry neither.
 */
const collectBodies = (
  raw: string,
  mail: ParsedMail,
  path: string,
): Effect.Effect<MessageBodies, ParseError> => {
  const boundary = multipartBoundary(mail);
  if (boundary === undefined) {
    return Effect.succeed({
      text: Option.fromNullable(mail.text),
      html:
        typeof mail.html === "string" && mail.html.length > 0
          ? Option.some(mail.html)
          : Option.none(),
    });
  }

  return Effect.reduce(splitMultipart(raw, boundary), noBodies, (found, part) =>
    Option.isSome(found.text) && Option.isSome(found.html)
      ? Effect.succeed(found)
      : parseMime(Buffer.from(part, "latin1"), path).pipe(
          Effect.flatMap((partMail) => collectBodies(part, partMail, path)),
          Effect.map((next) => ({
            text: Option.orElse(found.text, () => next.text),
            html: Option.orElse(found.html, () => next.html),
          })),
        ),
  );
};

// ============================================================================
// Normalization
// ============================================================================

export const toNormalizedMessage = (
  mail: ParsedMail,
  bodies: MessageBodies,
): NormalizedMessage => {
  const dateRaw = rawHeader(mail, "date");

  return {
    subject: mail.subject || MessageDefaults.subject,
    sender: addressText(mail.from) ?? MessageDefaults.sender,
    recipient: addressText(mail.to) ?? MessageDefaults.recipient,
    dateRaw: dateRaw ?? MessageDefaults.dateRaw,
    dateParsed: parseEmailDate(dateRaw),
    bodyText: Option.getOrElse(bodies.text, () => ""),
    bodyHtml: bodies.html,
    attachments: extractAttachments(mail),
  };
};

/**
 * Parse an RFC 5322 / MIME message. The first text/plain leaf becomes the
 * text body and the first text/html leaf the HTML body; the parser's own
 * html<->text synthesis is turned off so each body reflects real parts only.
 */
export const parseEml = (
  content: Uint8Array,
  path: string,
): Effect.Effect<NormalizedMessage, ParseError> =>
  Effect.gen(function* () {
    const mail = yield* parseMime(content, path);
    const bodies = yield* collectBodies(
      Buffer.from(content).toString("latin1"),
      mail,
      path,
    );
    return toNormalizedMessage(mail, bodies);
  });

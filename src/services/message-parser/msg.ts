import MsgReaderModule from "@kenjiuno/msgreader";
import { Effect, Option, Schema as S } from "effect";
import * as iconvLite from "iconv-lite";
import { ParseError } from "../../lib/errors.js";
import {
  type AttachmentDescriptor,
  MessageDefaults,
  type NormalizedMessage,
} from "../../lib/type.js";
import { parseEmailDate } from "./date.js";

// Node hands a CommonJS default import back as module.exports; Vitest unwraps it
const MsgReader =
  "default" in MsgReaderModule ? MsgReaderModule.default : MsgReaderModule;

// ============================================================================
// MSG field schema
// ============================================================================

const MsgRecipient = S.Struct({
  name: S.optional(S.String),
  email: S.optional(S.String),
  smtpAddress: S.optional(S.String),
  recipType: S.optional(S.String),
});

const MsgAttachment = S.Struct({
  fileName: S.optional(S.String),
  fileNameShort: S.optional(S.String),
  name: S.optional(S.String),
  contentLength: S.optional(S.Number),
  attachMimeTag: S.optional(S.String),
});

export const MsgFields = S.Struct({
  error: S.optional(S.String),
  subject: S.optional(S.String),
  senderName: S.optional(S.String),
  senderEmail: S.optional(S.String),
  senderSmtpAddress: S.optional(S.String),
  recipients: S.optional(S.Array(MsgRecipient)),
  headers: S.optional(S.String),
  clientSubmitTime: S.optional(S.String),
  messageDeliveryTime: S.optional(S.String),
  body: S.optional(S.String),
  bodyHtml: S.optional(S.String),
  html: S.optional(S.Uint8ArrayFromSelf),
  internetCodepage: S.optional(S.Number),
  attachments: S.optional(S.Array(MsgAttachment)),
});

export type MsgFields = typeof MsgFields.Type;
type MsgRecipient = typeof MsgRecipient.Type;

// ============================================================================
// Mapping
// ============================================================================

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const formatEmailAddress = (
  name?: string,
  email?: string,
): string | undefined => {
  const displayName = nonEmpty(name);
  const address = nonEmpty(email);
  if (!address) return displayName;
  return displayName && displayName !== address
    ? `${displayName} <${address}>`
    : address;
};

const isToRecipient = (recipient: MsgRecipient): boolean =>
  recipient.recipType === undefined || recipient.recipType === "to";

const formatRecipients = (
  recipients: readonly MsgRecipient[],
): string | undefined => {
  const text = recipients
    .filter(isToRecipient)
    .map((r) => formatEmailAddress(r.name, r.email || r.smtpAddress))
    .filter((entry): entry is string => entry !== undefined)
    .join(", ");
  return text.length > 0 ? text : undefined;
};

/**
 * The Date line of the embedded transport headers, when the message came in
 * over SMTP; it keeps the sender's original offset.
 */
const transportDate = (headers: string | undefined): string | undefined => {
  if (!headers) return undefined;
  const match = /^Date:[ \t]*(.*(?:\r?\n[ \t]+.*)*)/im.exec(headers);
  return match ? nonEmpty(match[1].replace(/\r?\n[ \t]+/g, " ")) : undefined;
};

const extractAttachments = (fields: MsgFields): AttachmentDescriptor[] =>
  (fields.attachments ?? []).flatMap((attachment) => {
    const fileName =
      nonEmpty(attachment.fileName) ??
      nonEmpty(attachment.fileNameShort) ??
      nonEmpty(attachment.name);
    if (!fileName) return [];
    return [
      {
        fileName,
        size: attachment.contentLength,
        contentType: attachment.attachMimeTag || "application/octet-stream",
      },
    ];
  });

const encodingForCodepage = (codepage: number | undefined): string => {
  if (codepage === undefined || codepage === 65001) return "utf8";
  const known = [`cp${codepage}`, `windows${codepage}`].find((name) =>
    iconvLite.encodingExists(name),
  );
  return known ?? "utf8";
};

/**
 * HTML body from the string property, or from the binary one decoded with
 * the message's internet code page
 */
const htmlBody = (fields: MsgFields): Option.Option<string> => {
  if (fields.bodyHtml && fields.bodyHtml.trim().length > 0) {
    return Option.some(fields.bodyHtml);
  }
  if (!fields.html || fields.html.length === 0) return Option.none();

  const decoded = iconvLite.decode(
    Buffer.from(fields.html),
    encodingForCodepage(fields.internetCodepage),
  );
  return decoded.trim().length > 0 ? Option.some(decoded) : Option.none();
};

export const toNormalizedMessage = (fields: MsgFields): NormalizedMessage => {
  const dateRaw =
    transportDate(fields.headers) ??
    nonEmpty(fields.clientSubmitTime) ??
    nonEmpty(fields.messageDeliveryTime);

  return {
    subject: nonEmpty(fields.subject) ?? MessageDefaults.subject,
    sender:
      formatEmailAddress(
        fields.senderName,
        fields.senderSmtpAddress || fields.senderEmail,
      ) ?? MessageDefaults.sender,
    recipient:
      formatRecipients(fields.recipients ?? []) ?? MessageDefaults.recipient,
    dateRaw: dateRaw ?? MessageDefaults.dateRaw,
    dateParsed: parseEmailDate(dateRaw),
    bodyText: fields.body ?? "",
    bodyHtml: htmlBody(fields),
    attachments: extractAttachments(fields),
  };
};

// ============================================================================
// Parser
// ============================================================================

/**
 * Parse an Outlook .msg (OLE compound file). Any failure rejects the whole
 * file; there is no partial record.
 */
export const parseMsg = (
  content: Uint8Array,
  path: string,
): Effect.Effect<NormalizedMessage, ParseError> =>
  Effect.gen(function* () {
    const raw = yield* Effect.try({
      try: () => {
        const view = new DataView(
          content.buffer,
          content.byteOffset,
          content.byteLength,
        );
        return new MsgReader(view).getFileData();
      },
      catch: (error) =>
        new ParseError({
          message: `Failed to read MSG file: ${error}`,
          path,
          cause: error,
        }),
    });

    const fields = yield* S.decodeUnknown(MsgFields)(raw).pipe(
      Effect.mapError(
        (error) =>
          new ParseError({
            message: `Unexpected MSG field layout: ${error.message}`,
            path,
            cause: error,
          }),
      ),
    );

    if (fields.error) {
      return yield* Effect.fail(
        new ParseError({
          message: `Failed to read MSG file: ${fields.error}`,
          path,
        }),
      );
    }

    return toNormalizedMessage(fields);
  });

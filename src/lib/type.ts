import { Data, type Option } from "effect";

// ============================================================================
// Message model
// ============================================================================

/** A parsed Date header: the instant plus the UTC offset it was written in */
export interface MessageDate {
  readonly instant: Date;
  /** Minutes east of UTC, as written in the header */
  readonly offsetMinutes: number;
}

export interface AttachmentDescriptor {
  readonly fileName: string;
  readonly size?: number | undefined;
  readonly contentType: string;
}

/** Format-agnostic record produced by parsing any supported email file */
export interface NormalizedMessage {
  readonly subject: string;
  readonly sender: string;
  readonly recipient: string;
  readonly dateRaw: string;
  readonly dateParsed: Option.Option<MessageDate>;
  readonly bodyText: string;
  readonly bodyHtml: Option.Option<string>;
  readonly attachments: readonly AttachmentDescriptor[];
}

export const MessageDefaults = {
  subject: "No Subject",
  sender: "Unknown Sender",
  recipient: "Unknown Recipient",
  dateRaw: "No Date",
} as const;

// ============================================================================
// Input sources
// ============================================================================

export type EmailSource = Data.TaggedEnum<{
  EmlSource: { readonly path: string };
  MsgSource: { readonly path: string };
}>;

export const EmailSource = Data.taggedEnum<EmailSource>();

// ============================================================================
// Batch results
// ============================================================================

/** How a PDF ended up being produced */
export type RenderMode = "html" | "text" | "degraded";

export interface ConversionResult {
  /** Output file names, in completion order */
  readonly converted: readonly string[];
  /** Input file names, in completion order */
  readonly failed: readonly string[];
  /** Output names that had an HTML body but went through the text fallback */
  readonly degraded: readonly string[];
  /** One reason per failed input */
  readonly errors: readonly string[];
}

export const emptyConversionResult: ConversionResult = {
  converted: [],
  failed: [],
  degraded: [],
  errors: [],
};

export interface ConversionReport extends ConversionResult {
  readonly inputDirectory: string;
  readonly outputDirectory: string;
  readonly browserAvailable: boolean;
}

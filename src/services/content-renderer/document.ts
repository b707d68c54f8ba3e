import * as cheerio from "cheerio";
import { Option } from "effect";
import type { NormalizedMessage } from "../../lib/type.js";
import { renderHtmlAsText } from "./html-to-text.js";

export interface EmailDocumentParts {
  readonly subject: string;
  readonly sender: string;
  readonly recipient: string;
  readonly date: string;
  readonly bodyHtml: string;
}

/**
 * Drop elements that would run code or pull in outside resources
 */
export const cleanBodyHtml = (html: string): string => {
  const $ = cheerio.load(html, null, false);
  $("script, style, meta, link").remove();
  return $.html();
};

/**
 * Assemble a standalone, print-ready HTML page for one message. Header
 * values are interpolated as given.
 */
export const buildEmailDocument = (parts: EmailDocumentParts): string => {
  const body = cleanBodyHtml(parts.bodyHtml);

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>${parts.subject}</title>
  <style>
    body {
      font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, "Helvetica Neue", Arial, sans-serif;
      line-height: 1.6;
      color: #333;
      max-width: 800px;
      margin: 0 auto;
      padding: 20px;
      background-color: #f9f9f9;
    }
    .email-header {
      background-color: #ffffff;
      border: 1px solid #dee2e6;
      border-radius: 8px;
      padding: 20px;
      margin-bottom: 20px;
    }
    .email-header h1 {
      color: #212529;
      font-size: 18px;
      margin: 0 0 12px 0;
      padding-bottom: 12px;
      border-bottom: 2px solid #dee2e6;
    }
    .email-header p {
      margin: 4px 0;
      color: #495057;
      font-size: 14px;
      word-break: break-word;
    }
    .email-content {
      background-color: #ffffff;
      border: 1px solid #dee2e6;
      border-radius: 8px;
      padding: 20px;
      overflow-wrap: break-word;
    }
    .email-content img {
      max-width: 100%;
      height: auto;
      border-radius: 4px;
    }
    .email-content a {
      color: #3498db;
      text-decoration: none;
    }
    .email-content h1, .email-content h2, .email-content h3 {
      color: #2c3e50;
    }
    .email-content ul, .email-content ol {
      padding-left: 20px;
    }
    .email-content blockquote {
      border-left: 4px solid #3498db;
      margin: 10px 0;
      padding-left: 15px;
      color: #666;
    }
    .email-content table {
      max-width: 100%;
    }
    @media print {
      body {
        background-color: #ffffff;
        padding: 0;
      }
    }
  </style>
</head>
<body>
  <div class="email-header">
    <h1>${parts.subject}</h1>
    <p><strong>From:</strong> ${parts.sender}</p>
    <p><strong>To:</strong> ${parts.recipient}</p>
    <p><strong>Date:</strong> ${parts.date}</p>
  </div>
  <div class="email-content">
    ${body}
  </div>
</body>
</html>
`;
};

/**
 * Plain-text rendition used by the text PDF path: a header block, a rule,
 * then the text body (or the HTML body rendered as text when there is none).
 */
export const buildTextDocument = (message: NormalizedMessage): string => {
  const body =
    message.bodyText.trim().length > 0
      ? message.bodyText
      : Option.match(message.bodyHtml, {
          onNone: () => "",
          onSome: renderHtmlAsText,
        });

  const header = [
    `Subject: ${message.subject}`,
    `From: ${message.sender}`,
    `To: ${message.recipient}`,
    `Date: ${message.dateRaw}`,
    "=".repeat(80),
  ].join("\n");

  return `${header}\n\n${body}`.replace(/\r\n?/g, "\n");
};

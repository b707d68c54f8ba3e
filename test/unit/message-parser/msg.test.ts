import { describe, expect, it } from "@effect/vitest";
import { burn } from "@kenjiuno/msgreader/lib/Burner.js";
import { TypeEnum } from "@kenjiuno/msgreader/lib/Reader.js";
import { Effect, Option } from "effect";
import {
  type MsgFields,
  parseMsg,
  toNormalizedMessage,
} from "../../../src/services/message-parser/msg.js";

const baseFields: MsgFields = {
  subject: "Budget review",
  senderName: "Alice Example",
  senderSmtpAddress: "alice@example.com",
  recipients: [
    { name: "Bob Example", email: "bob@example.com", recipType: "to" },
    { name: "Carol Example", email: "carol@example.com", recipType: "cc" },
    { name: "Dan Example", smtpAddress: "dan@example.com", recipType: "to" },
  ],
  clientSubmitTime: "Mon, 15 Jan 2024 10:30:00 GMT",
  body: "Numbers attached.",
};

describe("MSG Parser Tests", () => {
  describe("toNormalizedMessage", () => {
    it("should map sender and direct recipients", () => {
      const message = toNormalizedMessage(baseFields);

      expect(message.subject).toBe("Budget review");
      expect(message.sender).toBe("Alice Example <alice@example.com>");
      expect(message.recipient).toBe(
        "Bob Example <bob@example.com>, Dan Example <dan@example.com>",
      );
      expect(message.bodyText).toBe("Numbers attached.");
      expect(Option.isNone(message.bodyHtml)).toBe(true);
    });

    it("should take the date from the submit time", () => {
      const message = toNormalizedMessage(baseFields);

      expect(message.dateRaw).toBe("Mon, 15 Jan 2024 10:30:00 GMT");
      expect(
        Option.map(message.dateParsed, (date) => date.instant.toISOString()),
      ).toEqual(Option.some("2024-01-15T10:30:00.000Z"));
    });

    it("should prefer the Date line of the transport headers", () => {
      const message = toNormalizedMessage({
        ...baseFields,
        headers:
          "Received: from mx.example.com\r\nDate: Mon, 15 Jan 2024 05:30:00\r\n -0500\r\nSubject: Budget review\r\n",
      });

      expect(message.dateRaw).toBe("Mon, 15 Jan 2024 05:30:00 -0500");
      expect(
        Option.map(message.dateParsed, (date) => date.offsetMinutes),
      ).toEqual(Option.some(-300));
    });

    it("should fall back to defaults for empty fields", () => {
      const message = toNormalizedMessage({ subject: "  " });

      expect(message.subject).toBe("No Subject");
      expect(message.sender).toBe("Unknown Sender");
      expect(message.recipient).toBe("Unknown Recipient");
      expect(message.dateRaw).toBe("No Date");
      expect(Option.isNone(message.dateParsed)).toBe(true);
      expect(message.bodyText).toBe("");
    });

    it("should keep a non-blank HTML body", () => {
      const message = toNormalizedMessage({
        ...baseFields,
        bodyHtml: "<p>Numbers attached.</p>",
      });
      expect(message.bodyHtml).toEqual(Option.some("<p>Numbers attached.</p>"));

      const blank = toNormalizedMessage({ ...baseFields, bodyHtml: "  \n" });
      expect(Option.isNone(blank.bodyHtml)).toBe(true);
    });

    it("should decode a binary HTML body with the internet code page", () => {
      const message = toNormalizedMessage({
        ...baseFields,
        html: new Uint8Array(Buffer.from("<p>Caf\u00e9</p>", "latin1")),
        internetCodepage: 1252,
      });
      expect(message.bodyHtml).toEqual(Option.some("<p>Caf\u00e9</p>"));
    });

    it("should prefer the string HTML body over the binary one", () => {
      const message = toNormalizedMessage({
        ...baseFields,
        bodyHtml: "<p>string</p>",
        html: new TextEncoder().encode("<p>binary</p>"),
      });
      expect(message.bodyHtml).toEqual(Option.some("<p>string</p>"));
    });

    it("should list named attachments only", () => {
      const message = toNormalizedMessage({
        ...baseFields,
        attachments: [
          {
            fileName: "budget.xlsx",
            contentLength: 2048,
            attachMimeTag: "application/vnd.ms-excel",
          },
          { fileNameShort: "NOTES~1.TXT" },
          { contentLength: 12 },
        ],
      });

      expect(message.attachments).toEqual([
        {
          fileName: "budget.xlsx",
          size: 2048,
          contentType: "application/vnd.ms-excel",
        },
        {
          fileName: "NOTES~1.TXT",
          size: undefined,
          contentType: "application/octet-stream",
        },
      ]);
    });
  });

  describe("parseMsg", () => {
    it.effect("should read an HTML body stored as binary", () =>
      Effect.gen(function* () {
        const html = new TextEncoder().encode("<p>Hi <b>Bob</b></p>");
        const content = burn([
          { name: "Root Entry", type: TypeEnum.ROOT, children: [1], length: 0 },
          {
            name: "__substg1.0_10130102",
            type: TypeEnum.DOCUMENT,
            length: html.length,
            binaryProvider: () => html,
          },
        ]);

        const message = yield* parseMsg(content, "/mail/html.msg");
        expect(message.subject).toBe("No Subject");
        expect(message.bodyHtml).toEqual(Option.some("<p>Hi <b>Bob</b></p>"));
      }),
    );

    it.effect("should reject content that is not an Outlook message", () =>
      Effect.gen(function* () {
        const garbage = new TextEncoder().encode("this is not an msg file");

        const error = yield* Effect.flip(parseMsg(garbage, "/mail/broken.msg"));
        expect(error._tag).toBe("ParseError");
        expect(error.path).toBe("/mail/broken.msg");
      }),
    );
  });
});

import { describe, it, expect } from "vitest";
import {
  BODY_CHAR_LIMIT,
  decodeAttachments,
  decodeMessage,
  mimeLeaves,
  htmlPartText,
  plainPartText,
  selectBody,
  truncateBody,
} from "./decode.js";
import {
  alternativeMessage,
  messageWithAttachments,
  messageWithInlineTextFile,
  messageWithTwoTextParts,
  multipartBody,
  rawMessage,
} from "../testing/raw-message.js";

// ---------------------------------------------------------------------------
// Part decoding and body selection
// ---------------------------------------------------------------------------

describe("htmlPartText", () => {
  it("returns empty for a missing HTML part", () => {
    expect(htmlPartText(false)).toEqual({ status: "empty" });
    expect(htmlPartText(undefined)).toEqual({ status: "empty" });
  });

  it("strips markup", () => {
    expect(htmlPartText("<p>From <b>HTML</b></p>")).toEqual({
      status: "text",
      text: "From HTML",
    });
  });

  it("keeps link targets", () => {
    const result = htmlPartText(
      '<p>Visit <a href="https://example.com/docs">the docs</a></p>'
    );
    expect(result.status).toBe("text");
    if (result.status === "text") {
      expect(result.text).toContain("https://example.com/docs");
      expect(result.text).not.toContain("<a");
    }
  });

  it("collapses runs of blank lines", () => {
    const result = htmlPartText("<p>One</p><br><br><br><br><br><p>Two</p>");
    expect(result.status).toBe("text");
    if (result.status === "text") {
      expect(result.text).not.toMatch(/\n{3,}/);
      expect(result.text.startsWith("One")).toBe(true);
      expect(result.text.endsWith("Two")).toBe(true);
    }
  });

  it("returns empty when the markup has no text", () => {
    expect(htmlPartText("<div></div>")).toEqual({ status: "empty" });
  });
});

describe("plainPartText", () => {
  it("trims trailing whitespace", () => {
    expect(plainPartText("Hi there\r\n\r\n")).toEqual({
      status: "text",
      text: "Hi there",
    });
  });

  it("returns empty for missing or blank text", () => {
    expect(plainPartText(undefined)).toEqual({ status: "empty" });
    expect(plainPartText("  \n")).toEqual({ status: "empty" });
  });
});

describe("selectBody", () => {
  it("prefers HTML over plain text", () => {
    expect(
      selectBody({ status: "text", text: "html" }, { status: "text", text: "plain" })
    ).toBe("html");
  });

  it("falls back to plain text when the HTML part failed", () => {
    expect(
      selectBody(
        { status: "error", error: new Error("bad charset") },
        { status: "text", text: "plain" }
      )
    ).toBe("plain");
  });

  it("returns an empty string when nothing yields text", () => {
    expect(selectBody({ status: "empty" }, { status: "empty" })).toBe("");
  });
});

describe("truncateBody", () => {
  it("leaves short bodies alone", () => {
    expect(truncateBody("short")).toEqual({ body: "short", truncated: false });
  });

  it("keeps a body of exactly the limit", () => {
    const text = "x".repeat(BODY_CHAR_LIMIT);
    expect(truncateBody(text)).toEqual({ body: text, truncated: false });
  });

  it("cuts longer bodies to the limit", () => {
    const result = truncateBody("y".repeat(BODY_CHAR_LIMIT + 1));
    expect(result.body).toHaveLength(BODY_CHAR_LIMIT);
    expect(result.truncated).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// decodeMessage
// ---------------------------------------------------------------------------

describe("decodeMessage", () => {
  it("decodes headers and a plain body", async () => {
    const result = await decodeMessage(
      rawMessage({ subject: "Status", body: "Just text" })
    );

    expect(result).toEqual({
      from: "alice@example.com",
      to: "bob@example.com",
      subject: "Status",
      date: "Mon, 2 Feb 2026 10:30:00 +0100",
      body: "Just text",
      truncated: false,
      attachments: [],
    });
  });

  it("uses the HTML part of a multipart/alternative message", async () => {
    const result = await decodeMessage(
      alternativeMessage("From plain", "<p>From HTML</p>")
    );
    expect(result.body).toBe("From HTML");
  });

  it("decodes encoded-word subjects with their charset", async () => {
    const utf8 = await decodeMessage(
      rawMessage({ subject: "=?UTF-8?B?Q2lhbyBtb25kbw==?=", body: "x" })
    );
    expect(utf8.subject).toBe("Ciao mondo");

    const latin1 = await decodeMessage(
      rawMessage({ subject: "=?ISO-8859-1?Q?Caf=E9?=", body: "x" })
    );
    expect(latin1.subject).toBe("Café");
  });

  it("caps long bodies", async () => {
    const result = await decodeMessage(rawMessage({ body: "a".repeat(6000) }));
    expect(result.body).toBe("a".repeat(BODY_CHAR_LIMIT));
    expect(result.truncated).toBe(true);
  });

  it("lists attachments and inline files in order", async () => {
    const result = await decodeMessage(messageWithAttachments());

    expect(result.body).toBe("See attached.");
    expect(result.attachments).toEqual([
      { index: 0, filename: "hello.txt", contentType: "text/plain", size: 5 },
      { index: 1, filename: "logo.png", contentType: "image/png", size: 8 },
    ]);
  });

  it("takes the body from the first text part only", async () => {
    const result = await decodeMessage(messageWithTwoTextParts());
    expect(result.body).toBe("first");
    expect(result.attachments).toEqual([]);
  });

  it("lists an inline text part with a filename instead of reading it as body", async () => {
    const result = await decodeMessage(messageWithInlineTextFile());

    expect(result.body).toBe("body");
    expect(result.attachments).toEqual([
      { index: 0, filename: "notes.txt", contentType: "text/plain", size: 5 },
    ]);
  });

  it("finds the HTML part inside nested multiparts", async () => {
    const raw = rawMessage({
      contentType: 'multipart/mixed; boundary="outer"',
      body: multipartBody("outer", [
        {
          headers: ['Content-Type: multipart/alternative; boundary="inner"'],
          body: multipartBody("inner", [
            { headers: ["Content-Type: text/plain"], body: "plain" },
            { headers: ["Content-Type: text/html"], body: "<p>rich</p>" },
          ]),
        },
        {
          headers: [
            "Content-Type: application/pdf",
            'Content-Disposition: attachment; filename="a.pdf"',
            "Content-Transfer-Encoding: base64",
          ],
          body: "JVBERg==",
        },
      ]),
    });

    const result = await decodeMessage(raw);
    expect(result.body).toBe("rich");
    expect(result.attachments).toEqual([
      { index: 0, filename: "a.pdf", contentType: "application/pdf", size: 4 },
    ]);
  });

  it("returns an empty date when the header is missing", async () => {
    const raw = "From: a@example.com\r\nSubject: No date\r\n\r\nbody";
    const result = await decodeMessage(raw);
    expect(result.date).toBe("");
    expect(result.subject).toBe("No date");
  });
});

describe("mimeLeaves", () => {
  it("lists leaf parts in tree order with their dispositions", async () => {
    const leaves = await mimeLeaves(messageWithAttachments());

    expect(
      leaves.map(({ contentType, disposition, filename }) => [contentType, disposition, filename])
    ).toEqual([
      ["text/plain", "", ""],
      ["text/plain", "attachment", "hello.txt"],
      ["image/png", "inline", "logo.png"],
    ]);
  });

  it("treats a single-part message as one leaf", async () => {
    const leaves = await mimeLeaves(rawMessage({ body: "x" }));
    expect(leaves).toHaveLength(1);
    expect(leaves[0].contentType).toBe("text/plain");
  });
});

describe("decodeAttachments", () => {
  it("returns the decoded payload of an inline text file", async () => {
    const [notes] = await decodeAttachments(messageWithInlineTextFile());
    expect(notes.filename).toBe("notes.txt");
    expect(notes.content.toString("utf-8")).toBe("notes");
  });
});

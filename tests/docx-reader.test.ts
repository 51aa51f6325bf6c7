import { describe, it, expect } from "vitest";
import PizZip from "pizzip";
import { Packer } from "docx";
import {
  decodeXmlText,
  readDocxParagraphs,
  readStyleNames,
  styleHint,
} from "../src/render/docx_reader.js";
import { buildStyledDocument } from "../src/render/docx_formatter.js";
import { inferStructure, type StyledParagraph } from "../src/render/structure.js";
import { TemplateCatalog } from "../src/style/catalog.js";

function docxWithBody(bodyXml: string, stylesXml?: string): Buffer {
  const zip = new PizZip();
  if (stylesXml !== undefined) zip.file("word/styles.xml", stylesXml);
  zip.file(
    "word/document.xml",
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
      `<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main">` +
      `<w:body>${bodyXml}</w:body></w:document>`,
  );
  return zip.generate({ type: "nodebuffer" });
}

describe("readDocxParagraphs", () => {
  it("joins text split across runs", () => {
    const buf = docxWithBody(
      `<w:p><w:r><w:t>Hel</w:t></w:r><w:r><w:t xml:space="preserve">lo world</w:t></w:r></w:p>`,
    );
    expect(readDocxParagraphs(buf)).toEqual([{ text: "Hello world" }]);
  });

  it("keeps empty paragraphs and does not swallow the next one", () => {
    const buf = docxWithBody(`<w:p/><w:p w:rsidR="00A1"/><w:p><w:r><w:t>after</w:t></w:r></w:p>`);
    expect(readDocxParagraphs(buf)).toEqual([{ text: "" }, { text: "" }, { text: "after" }]);
  });

  it("reads heading hints from paragraph styles", () => {
    const buf = docxWithBody(
      `<w:p><w:pPr><w:pStyle w:val="Title"/></w:pPr><w:r><w:t>T</w:t></w:r></w:p>` +
        `<w:p><w:pPr><w:pStyle w:val="Heading1"/></w:pPr><w:r><w:t>H1</w:t></w:r></w:p>` +
        `<w:p><w:pPr><w:pStyle w:val="Heading3"/></w:pPr><w:r><w:t>H3</w:t></w:r></w:p>` +
        `<w:p><w:pPr><w:pStyle w:val="Normal"/></w:pPr><w:r><w:t>N</w:t></w:r></w:p>`,
    );
    expect(readDocxParagraphs(buf)).toEqual([
      { text: "T", hint: "title" },
      { text: "H1", hint: "heading1" },
      { text: "H3", hint: "heading2" },
      { text: "N" },
    ]);
  });

  it("resolves localized style ids through styles.xml", () => {
    const styles =
      `<w:styles xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main">` +
      `<w:style w:type="paragraph" w:styleId="a3"><w:name w:val="Title"/></w:style>` +
      `<w:style w:type="paragraph" w:styleId="1"><w:name w:val="heading 1"/></w:style>` +
      `<w:style w:type="paragraph" w:styleId="2"><w:name w:val="heading 2"/></w:style>` +
      `<w:style w:type="paragraph" w:styleId="a4"><w:name w:val="List Paragraph"/></w:style>` +
      `</w:styles>`;
    const buf = docxWithBody(
      `<w:p><w:pPr><w:pStyle w:val="a3"/></w:pPr><w:r><w:t>通知</w:t></w:r></w:p>` +
        `<w:p><w:pPr><w:pStyle w:val="1"/></w:pPr><w:r><w:t>总则</w:t></w:r></w:p>` +
        `<w:p><w:pPr><w:pStyle w:val="2"/></w:pPr><w:r><w:t>范围</w:t></w:r></w:p>` +
        `<w:p><w:pPr><w:pStyle w:val="a4"/></w:pPr><w:r><w:t>条目</w:t></w:r></w:p>`,
      styles,
    );
    expect(readDocxParagraphs(buf)).toEqual([
      { text: "通知", hint: "title" },
      { text: "总则", hint: "heading1" },
      { text: "范围", hint: "heading2" },
      { text: "条目" },
    ]);
  });

  it("decodes XML entities", () => {
    const buf = docxWithBody(`<w:p><w:r><w:t>A &amp; B &lt;C&gt;</w:t></w:r></w:p>`);
    expect(readDocxParagraphs(buf)).toEqual([{ text: "A & B <C>" }]);
  });

  it("throws when the archive has no document part", () => {
    const zip = new PizZip();
    zip.file("readme.txt", "not a document");
    expect(() => readDocxParagraphs(zip.generate({ type: "nodebuffer" }))).toThrow(
      "word/document.xml not found",
    );
  });

  it("round-trips categories through a rendered document", async () => {
    const paragraphs: StyledParagraph[] = [
      { category: "title", text: "关于开展安全检查的通知" },
      { category: "heading1", text: "一、检查范围" },
      { category: "heading2", text: "（一）办公区域" },
      { category: "body", text: "A & B <C>" },
      { category: "signature", text: "办公室" },
      { category: "signature", text: "2024年3月1日" },
    ];
    const config = new TemplateCatalog().resolve("default");
    const buffer = await Packer.toBuffer(buildStyledDocument(config, paragraphs));

    expect(inferStructure(readDocxParagraphs(buffer))).toEqual(paragraphs);
  });
});

describe("helpers", () => {
  it("maps style ids to hints", () => {
    expect(styleHint("Title")).toBe("title");
    expect(styleHint("heading 1")).toBe("heading1");
    expect(styleHint("Heading2")).toBe("heading2");
    expect(styleHint("ListParagraph")).toBeUndefined();
  });

  it("maps style ids to names", () => {
    const names = readStyleNames(
      `<w:style w:type="paragraph" w:default="1" w:styleId="a"><w:name w:val="Normal"/></w:style>` +
        `<w:style w:type="character" w:styleId="a0"><w:name w:val="Default Paragraph Font"/></w:style>`,
    );
    expect([...names]).toEqual([
      ["a", "Normal"],
      ["a0", "Default Paragraph Font"],
    ]);
  });

  it("leaves unknown entities alone", () => {
    expect(decodeXmlText("&amp;lt; &nbsp;")).toBe("&lt; &nbsp;");
  });
});

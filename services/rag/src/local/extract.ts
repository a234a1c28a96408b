import { readFile } from "node:fs/promises";
import { HTMLElement, NodeType, parse, type Node } from "node-html-parser";
import { PDFParse } from "pdf-parse";

const SKIPPED_TAGS = new Set(["script", "style", "noscript", "head", "template"]);

/**
 * Flatten HTML to plain text, keeping block boundaries as blank lines so the
 * paragraph separator still applies when the text is chunked.
 */
function nodeToText(node: Node): string {
  if (node.nodeType === NodeType.TEXT_NODE) {
    return node.text.replace(/\s+/g, " ");
  }
  if (!(node instanceof HTMLElement)) return "";

  const tag = node.rawTagName?.toLowerCase() ?? "";
  if (SKIPPED_TAGS.has(tag)) return "";
  if (tag === "br") return "\n";
  if (tag === "hr") return "\n\n";
  if (tag === "pre") return `\n\n${node.text.trim()}\n\n`;

  const inner = node.childNodes.map(nodeToText).join("");

  if (tag === "li") return `• ${inner.trim()}\n`;
  if (tag === "tr") {
    const cells = node.querySelectorAll("th, td").map((cell) => cell.text.trim());
    return `| ${cells.join(" | ")} |\n`;
  }
  if (/^h[1-6]$/.test(tag)) {
    return `\n\n${"#".repeat(Number(tag[1]))} ${inner.trim()}\n\n`;
  }
  if (["p", "div", "section", "article", "ul", "ol", "table", "blockquote"].includes(tag)) {
    return `\n\n${inner}\n\n`;
  }
  return inner;
}

export function htmlToText(html: string): string {
  return nodeToText(parse(html))
    .replace(/[ \t]+\n/g, "\n")
    .replace(/\n[ \t]+/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export async function pdfToText(data: Buffer): Promise<string> {
  const parser = new PDFParse({ data });
  try {
    const result = await parser.getText();
    return result.text;
  } finally {
    await parser.destroy();
  }
}

/** Read a file's text according to its extension. Unknown extensions are read as UTF-8. */
export async function extractText(filePath: string, extension: string): Promise<string> {
  switch (extension) {
    case ".pdf":
      return pdfToText(await readFile(filePath));
    case ".html":
    case ".htm":
      return htmlToText(await readFile(filePath, "utf-8"));
    default:
      return readFile(filePath, "utf-8");
  }
}

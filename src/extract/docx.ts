import JSZip from "jszip";

const XML_ENTITIES: ReadonlyArray<[RegExp, string]> = [
  [/&lt;/g, "<"],
  [/&gt;/g, ">"],
  [/&quot;/g, '"'],
  [/&apos;/g, "'"],
  [/&amp;/g, "&"],
];

function xmlToText(xml: string): string {
  const stripped = xml
    .replace(/<\/w:p>/g, "\n") // paragraphs
    .replace(/<w:(?:tab|br)\/>/g, " ")
    .replace(/<[^>]+>/g, ""); // any other tags
  const decoded = XML_ENTITIES.reduce(
    (text, [pattern, value]) => text.replace(pattern, value),
    stripped
  );
  return decoded
    .split("\n")
    .map((line) => line.replace(/[ \t]+/g, " ").trim())
    .filter(Boolean)
    .join("\n");
}

export async function extractDocxText(buffer: Buffer): Promise<string> {
  const zip = await JSZip.loadAsync(buffer);
  // Main document
  const main = zip.file("word/document.xml");
  if (!main) {
    throw new Error("ZIP archive is not a DOCX document");
  }

  // Headers and footers if present
  const extras = zip.file(/^word\/(?:header|footer)\d+\.xml$/);
  const parts = await Promise.all(
    [main, ...extras].map((entry) => entry.async("string"))
  );

  return parts.map(xmlToText).filter(Boolean).join("\n");
}

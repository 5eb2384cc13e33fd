import { PDFParse } from "pdf-parse";
import { ExtractionError } from "../core/errors";

export async function extractPdfText(document: Buffer): Promise<string> {
  const parser = new PDFParse({ data: document });
  let text: string;
  try {
    const parsed = await parser.getText();
    text = parsed.text ?? "";
  } finally {
    await parser.destroy().catch(() => undefined);
  }

  if (text.trim() === "") {
    throw new ExtractionError("Document has no text layer");
  }
  return text;
}

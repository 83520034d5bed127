import { PDFParse } from "pdf-parse";

export interface DocumentText {
  text: string;
  pageCount: number;
}

export type TextExtractor = (bytes: Buffer) => Promise<DocumentText>;

export const extractTextWithPdfParse: TextExtractor = async (bytes) => {
  const parser = new PDFParse({ data: bytes });
  try {
    const parsed = await parser.getText();
    return {
      text: parsed.text ?? "",
      pageCount: parsed.total,
    };
  } finally {
    await parser.destroy().catch(() => undefined);
  }
};

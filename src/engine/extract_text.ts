import path from "path"
import mammoth from "mammoth"
import {
  extractCandidateName,
  extractContactInfo,
  normalizeDocumentText,
  type ContactInfo,
} from "../../core/domain/document.js"
import { extractionFailed, unsupportedFormat } from "../lib/errors.js"

export type DocumentFormat = "txt" | "docx" | "pdf"

export type ExtractedDocument = {
  content: string
  candidateName: string | null
  contactInfo: ContactInfo | null
}

export function detectFormat(filename: string): DocumentFormat {
  const ext = path.extname(filename).toLowerCase()
  if (ext === ".txt") return "txt"
  if (ext === ".docx") return "docx"
  if (ext === ".pdf") return "pdf"
  throw unsupportedFormat(ext)
}

// pdfjs is heavy; load it only when a PDF actually shows up.
async function pdfToText(bytes: Uint8Array): Promise<string> {
  const { getDocument } = await import("pdfjs-dist/legacy/build/pdf.mjs")
  const doc = await getDocument({ data: bytes, useSystemFonts: true, isEvalSupported: false }).promise
  try {
    let out = ""
    for (let n = 1; n <= doc.numPages; n++) {
      const page = await doc.getPage(n)
      const content = await page.getTextContent()
      for (const item of content.items) {
        if (!("str" in item)) continue
        out += item.str
        out += item.hasEOL ? "\n" : ""
      }
      out += "\n"
    }
    return out
  } finally {
    await doc.destroy()
  }
}

async function rawText(bytes: Buffer, format: DocumentFormat): Promise<string> {
  switch (format) {
    case "txt":
      return new TextDecoder("utf-8").decode(bytes)
    case "docx": {
      const result = await mammoth.extractRawText({ buffer: bytes })
      return result.value || ""
    }
    case "pdf":
      return pdfToText(new Uint8Array(bytes))
  }
}

/**
 * Bytes + filename -> normalised text and best-effort candidate fields.
 * Unsupported extensions and documents without text are rejected.
 */
export async function extractDocument(bytes: Buffer, filename: string): Promise<ExtractedDocument> {
  const format = detectFormat(filename)

  let text: string
  try {
    text = normalizeDocumentText(await rawText(bytes, format))
  } catch (e: unknown) {
    throw extractionFailed(`Could not read ${format.toUpperCase()} document: ${e instanceof Error ? e.message : String(e)}`)
  }

  if (!text) {
    throw extractionFailed(
      format === "pdf"
        ? "The PDF has no extractable text (scanned image?). Upload a text-based PDF, DOCX or TXT."
        : "The document contains no text"
    )
  }

  return {
    content: text,
    candidateName: extractCandidateName(text),
    contactInfo: extractContactInfo(text),
  }
}

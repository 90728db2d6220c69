/**
 * Full-text extraction for paper PDFs
 */

export type PdfTextExtractor = (data: Uint8Array) => Promise<string>

export const extractPdfText: PdfTextExtractor = async (data) => {
  // pdf.js is only loaded once a PDF is actually read
  const { extractText, getDocumentProxy } = await import('unpdf')

  const pdf = await getDocumentProxy(data)
  const { text } = await extractText(pdf, { mergePages: true })
  return text
}

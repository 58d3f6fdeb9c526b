/**
 * Document Loader
 *
 * Turns uploaded bytes into plain text. PDFs are parsed with pdfjs-dist
 * directly from the buffer; text documents are decoded as UTF-8.
 */

import { extname } from "node:path";
import pdfjs, { type PDFDocumentProxy } from "pdfjs-dist";
import { UnsupportedFormatError } from "../errors.js";
import { ingestLogger } from "../logger.js";
import type { DocumentType } from "./types.js";

const logger = ingestLogger.child({ component: "loader" });

const TEXT_EXTENSIONS = new Set([".txt", ".md", ".markdown", ".text"]);
const PDF_EXTENSIONS = new Set([".pdf"]);

/**
 * Infer the document type from a source name's extension
 *
 * @throws UnsupportedFormatError for any other extension
 */
export function detectDocumentType(sourceName: string): DocumentType {
	const ext = extname(sourceName).toLowerCase();
	if (PDF_EXTENSIONS.has(ext)) return "pdf";
	if (TEXT_EXTENSIONS.has(ext)) return "text";
	throw new UnsupportedFormatError(`Unsupported file type: ${sourceName}`, sourceName);
}

/**
 * Decode UTF-8 text, dropping a leading BOM. Invalid byte sequences are rejected
 */
function decodeText(bytes: Uint8Array, sourceName: string): string {
	try {
		return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
	} catch {
		throw new UnsupportedFormatError(`${sourceName} is not valid UTF-8 text`, sourceName);
	}
}

/**
 * Extract the text of every page, pages separated by a blank line
 */
async function extractPdfText(bytes: Uint8Array, sourceName: string): Promise<string> {
	let doc: PDFDocumentProxy;
	try {
		// pdfjs takes ownership of the buffer it is given
		doc = await pdfjs.getDocument({ data: new Uint8Array(bytes), isEvalSupported: false }).promise;
	} catch (error) {
		throw new UnsupportedFormatError(`${sourceName} could not be parsed as PDF: ${String(error)}`, sourceName);
	}

	try {
		const pages: string[] = [];
		for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber++) {
			const page = await doc.getPage(pageNumber);
			const content = await page.getTextContent();
			const pageText = content.items
				.map((item) => ("str" in item ? item.str + (item.hasEOL ? "\n" : "") : ""))
				.join("")
				.replace(/[ \t]+/g, " ")
				.trim();
			if (pageText) {
				pages.push(pageText);
			}
		}
		logger.debug({ sourceName, pages: doc.numPages }, "Extracted PDF text");
		return pages.join("\n\n");
	} finally {
		await doc.destroy();
	}
}

/**
 * Extract plain text from a document
 *
 * @throws UnsupportedFormatError for unknown types or unreadable content
 */
export async function loadDocumentText(bytes: Uint8Array, sourceName: string, type: DocumentType): Promise<string> {
	switch (type) {
		case "pdf":
			return extractPdfText(bytes, sourceName);
		case "text":
			return decodeText(bytes, sourceName);
		default:
			throw new UnsupportedFormatError(`Unsupported document type for ${sourceName}`, sourceName);
	}
}

import { jsPDF } from 'jspdf';
import { SUMMARY } from '../config/guide';
import { RenderError, errorMessage } from '../utils/errors';

const PAGE_MARGIN = 10;
const BODY_LINE_HEIGHT = 7;
const DISCLAIMER_LINE_HEIGHT = 5;

/**
 * Reduces text to what the built-in PDF fonts can draw: printable ASCII plus
 * line breaks and tabs. Every other code point becomes a single '?'.
 */
export function sanitizeText(text: string): string {
  return text.replace(/\r\n?/g, '\n').replace(/[^\n\t\x20-\x7E]/gu, '?');
}

export function toDataUri(bytes: Buffer): string {
  return `data:${SUMMARY.mimeType};base64,${bytes.toString('base64')}`;
}

export class RenderService {
  renderSummary(symptoms: string, guide: string): Buffer {
    try {
      const doc = new jsPDF({ unit: 'mm', format: 'a4' });
      let y = PAGE_MARGIN;

      doc.setFont('helvetica', 'bold');
      doc.setFontSize(16);
      doc.text(SUMMARY.title, doc.internal.pageSize.getWidth() / 2, y + 7, { align: 'center' });
      y += 10 + 5;

      doc.setFont('helvetica', 'normal');
      doc.setFontSize(11);
      y = this.writeParagraph(doc, `Symptoms:\n${sanitizeText(symptoms)}`, y, BODY_LINE_HEIGHT);
      y += 5;
      y = this.writeParagraph(doc, `Guidance:\n${sanitizeText(guide)}`, y, BODY_LINE_HEIGHT);

      y += 10;
      doc.setFont('helvetica', 'italic');
      doc.setFontSize(8);
      this.writeParagraph(doc, SUMMARY.disclaimer, y, DISCLAIMER_LINE_HEIGHT);

      return Buffer.from(doc.output('arraybuffer'));
    } catch (error) {
      throw new RenderError(`PDF generation failed: ${errorMessage(error)}`);
    }
  }

  private writeParagraph(doc: jsPDF, text: string, top: number, lineHeight: number): number {
    const pageHeight = doc.internal.pageSize.getHeight();
    const contentWidth = doc.internal.pageSize.getWidth() - PAGE_MARGIN * 2;
    const lines: string[] = doc.splitTextToSize(text, contentWidth);
    let y = top;

    for (const line of lines) {
      if (y + lineHeight > pageHeight - PAGE_MARGIN) {
        doc.addPage();
        y = PAGE_MARGIN;
      }
      // baseline sits a little above the bottom of the line box
      doc.text(line, PAGE_MARGIN, y + lineHeight * 0.75);
      y += lineHeight;
    }

    return y;
  }
}

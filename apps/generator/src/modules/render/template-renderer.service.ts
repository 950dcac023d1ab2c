import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
  PDF_LAYOUT,
  buildArtifactFileName,
  markerKey,
  type CertificateArtifact,
  type RosterRow,
} from '@certgen/shared';
import {
  ConfigurationError,
  RenderConversionError,
  TemplateLoadError,
  describeCause,
} from '../../common/errors/certificate-errors';
import { MARKER_PART_PATTERN, fillMarkers } from './docx-text';

interface MeasuringFont {
  widthOfTextAtSize: (value: string, size: number) => number;
}

interface Paragraph {
  text: string;
  title: boolean;
}

/**
 * Fills a .docx template with a row's fields and turns the result into a PDF.
 *
 * Every call unzips its own copy of the template bytes, so renders never
 * share substitution state.
 */
@Injectable()
export class TemplateRendererService {
  private readonly logger = new Logger(TemplateRendererService.name);

  /** Read and check the template once per run. Any problem here is fatal. */
  async loadTemplate(templatePath: string): Promise<Buffer> {
    const resolved = path.resolve(process.cwd(), templatePath);
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(resolved);
    } catch (err) {
      throw new ConfigurationError(`Template not readable at ${resolved}: ${describeCause(err)}`, { cause: err });
    }

    try {
      await this.openTemplate(bytes);
    } catch (err) {
      throw new ConfigurationError(`Template ${resolved} is not a usable .docx: ${describeCause(err)}`, { cause: err });
    }

    this.logger.log(`Template loaded from ${resolved} (${bytes.length} bytes)`);
    return bytes;
  }

  async render(template: Buffer, row: RosterRow): Promise<CertificateArtifact> {
    const docx = await this.fillTemplate(template, row.fields);
    const pdf = await this.convertToPdf(docx);
    const fileName = buildArtifactFileName(row);
    this.logger.debug(`Rendered ${fileName} (${pdf.length} bytes)`);
    return { fileName, docx, pdf };
  }

  /**
   * Substitute `{{ key }}` markers. Keys match field names ignoring case and
   * accents; a marker with no matching field becomes an empty string.
   */
  async fillTemplate(template: Buffer, fields: Record<string, string>): Promise<Buffer> {
    const zip = await this.openTemplate(template);
    const values = new Map<string, string>();
    for (const [key, value] of Object.entries(fields)) {
      const folded = markerKey(key);
      // First column wins when two headers fold to the same key
      if (!values.has(folded)) values.set(folded, value);
    }

    const parts = Object.keys(zip.files)
      .filter((name) => MARKER_PART_PATTERN.test(name))
      .sort();
    let replaced = 0;

    for (const name of parts) {
      const entry = zip.file(name);
      if (!entry) continue;
      const xml = await entry.async('string');
      const result = fillMarkers(xml, (key) => values.get(markerKey(key)) ?? '');
      if (result.replaced === 0) continue;
      replaced += result.replaced;
      // Keep the entry date so identical input zips to identical bytes
      zip.file(name, result.xml, { date: entry.date });
    }

    this.logger.debug(`Filled ${replaced} markers`);
    return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
  }

  /** Lay the document's paragraphs out on A4 pages */
  async convertToPdf(docx: Buffer): Promise<Buffer> {
    let paragraphs: Paragraph[];
    try {
      paragraphs = await this.extractParagraphs(docx);
    } catch (err) {
      throw new RenderConversionError(`Could not read filled document: ${describeCause(err)}`, { cause: err });
    }

    try {
      return await this.layoutPdf(paragraphs);
    } catch (err) {
      throw new RenderConversionError(`PDF conversion failed: ${describeCause(err)}`, { cause: err });
    }
  }

  private async openTemplate(bytes: Buffer) {
    const JSZip = (await import('jszip')).default;
    const zip = await JSZip.loadAsync(bytes).catch((err: unknown) => {
      throw new TemplateLoadError(`Template is not a zip archive: ${describeCause(err)}`, { cause: err });
    });
    if (!zip.file('word/document.xml')) {
      throw new TemplateLoadError('Template has no word/document.xml');
    }
    return zip;
  }

  private async extractParagraphs(docx: Buffer): Promise<Paragraph[]> {
    const mammoth = await import('mammoth');
    const { value } = await mammoth.extractRawText({ buffer: docx });
    const lines = value
      .split(/\r?\n/)
      .map((line) => this.normalizeLine(line))
      .filter((line) => line.length > 0);
    return lines.map((text, index) => ({ text, title: index === 0 }));
  }

  private async layoutPdf(paragraphs: Paragraph[]): Promise<Buffer> {
    const { PDFDocument, StandardFonts, rgb } = await import('pdf-lib');
    // No producer or dates: the same paragraphs give the same bytes
    const pdfDoc = await PDFDocument.create({ updateMetadata: false });
    const bodyFont = await pdfDoc.embedFont(StandardFonts.Helvetica);
    const titleFont = await pdfDoc.embedFont(StandardFonts.HelveticaBold);
    const supported = new Set(bodyFont.getCharacterSet());

    const { PAGE_WIDTH, PAGE_HEIGHT, MARGIN_X, MARGIN_TOP, MARGIN_BOTTOM } = PDF_LAYOUT;
    const maxWidth = PAGE_WIDTH - MARGIN_X * 2;
    let page = pdfDoc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
    let y = PAGE_HEIGHT - MARGIN_TOP;

    for (const paragraph of paragraphs) {
      const font = paragraph.title ? titleFont : bodyFont;
      const fontSize = paragraph.title ? PDF_LAYOUT.TITLE_FONT_SIZE : PDF_LAYOUT.BODY_FONT_SIZE;
      const lineHeight = paragraph.title ? PDF_LAYOUT.TITLE_LINE_HEIGHT : PDF_LAYOUT.BODY_LINE_HEIGHT;
      const text = this.toFontCharset(paragraph.text, supported);

      for (const row of this.wrapTextToWidth(text, font, fontSize, maxWidth)) {
        if (y < MARGIN_BOTTOM + lineHeight) {
          page = pdfDoc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
          y = PAGE_HEIGHT - MARGIN_TOP;
        }
        const width = font.widthOfTextAtSize(row, fontSize);
        page.drawText(row, {
          x: (PAGE_WIDTH - width) / 2,
          y,
          size: fontSize,
          font,
          color: rgb(0, 0, 0),
        });
        y -= lineHeight;
      }

      y -= PDF_LAYOUT.PARAGRAPH_GAP;
    }

    return Buffer.from(await pdfDoc.save());
  }

  /** Standard fonts only cover WinAnsi; anything else prints as '?' */
  private toFontCharset(text: string, supported: Set<number>): string {
    let out = '';
    for (const ch of text) {
      const code = ch.codePointAt(0) ?? 0;
      out += supported.has(code) ? ch : '?';
    }
    return out;
  }

  private wrapTextToWidth(text: string, font: MeasuringFont, fontSize: number, maxWidth: number): string[] {
    const line = this.normalizeLine(text);
    if (!line) return [];

    const words = line.split(' ');
    const rows: string[] = [];
    let current = '';

    for (const word of words) {
      const candidate = current ? `${current} ${word}` : word;
      if (font.widthOfTextAtSize(candidate, fontSize) <= maxWidth) {
        current = candidate;
        continue;
      }
      if (current) rows.push(current);
      current = word;
    }
    if (current) rows.push(current);

    return rows;
  }

  private normalizeLine(value: string): string {
    return value
      .replace(/\u00a0/g, ' ')
      .replace(/[ \t]+/g, ' ')
      .trim();
  }
}

import PDFDocument from 'pdfkit';
import type { BrandingSnapshot, DocumentSnapshot } from '../types/snapshot.js';
import type { Logger } from '../utils/logger.js';
import { noopLogger, errorMessage } from '../utils/logger.js';
import { contentHash } from '../utils/hash.js';
import { BillingError, RenderError, RenderTimeoutError } from '../errors/index.js';
import { formatAmount } from '../snapshot/money.js';
import type { AssetLoader } from './assets.js';
import { FileAssetLoader, detectImageFormat, isFontFile } from './assets.js';
import type { RGB } from './color.js';
import { cssColorVariables, parseHexColor } from './color.js';
import type { TemplateLayout } from './templates.js';
import { resolveTemplate } from './templates.js';

export const DEFAULT_RENDER_TIMEOUT_MS = 10_000;

const STANDARD_FONTS: Record<string, { regular: string; bold: string }> = {
  Helvetica: { regular: 'Helvetica', bold: 'Helvetica-Bold' },
  'Times-Roman': { regular: 'Times-Roman', bold: 'Times-Bold' },
  Courier: { regular: 'Courier', bold: 'Courier-Bold' },
};

const FALLBACK_FONT = { regular: 'Helvetica', bold: 'Helvetica-Bold' };
const BRAND_FONT = 'BrandFont';
const TEXT_COLOR: RGB = [17, 24, 39];
const MUTED_COLOR: RGB = [107, 114, 128];
const WHITE: RGB = [255, 255, 255];

export interface RendererOptions {
  assets?: AssetLoader;
  logger?: Logger;
  renderTimeoutMs?: number;
}

interface ResolvedBranding {
  primary: RGB;
  accent: RGB;
  fonts: { regular: string; bold: string };
  fontBytes: Buffer | null;
  logo: Buffer | null;
}

/** Stable hash of the branding a render used; drives artifact reuse. */
export function brandingFingerprint(branding: BrandingSnapshot): string {
  return contentHash(branding);
}

export function documentTitle(snapshot: Pick<DocumentSnapshot, 'kind'>): string {
  return snapshot.kind.toUpperCase();
}

/**
 * Renders a snapshot with a template and branding into a PDF.
 * Identical inputs give byte-identical output: the PDF info dates come from
 * the snapshot and only deterministic drawing calls are made.
 */
export class Renderer {
  private readonly assets: AssetLoader;
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(options?: RendererOptions) {
    this.assets = options?.assets ?? new FileAssetLoader();
    this.logger = options?.logger ?? noopLogger;
    this.timeoutMs = options?.renderTimeoutMs ?? DEFAULT_RENDER_TIMEOUT_MS;
  }

  async render(
    snapshot: DocumentSnapshot,
    templateId: string,
    branding: BrandingSnapshot,
  ): Promise<Buffer> {
    const layout = resolveTemplate(templateId);
    const primary = parseHexColor(branding.primaryColor, 'primaryColor');
    const accent = parseHexColor(branding.accentColor, 'accentColor');

    const work = this.resolveAssets(branding).then((assets) =>
      this.draw(snapshot, layout, branding, { primary, accent, ...assets }),
    );

    return withTimeout(work, this.timeoutMs);
  }

  /** HTML preview sharing the normalised colours with the PDF path. */
  preview(snapshot: DocumentSnapshot, templateId: string, branding: BrandingSnapshot): string {
    const layout = resolveTemplate(templateId);
    const primary = parseHexColor(branding.primaryColor, 'primaryColor');
    const accent = parseHexColor(branding.accentColor, 'accentColor');
    const title = documentTitle(snapshot);

    const rows = snapshot.lineItems
      .map(
        (line) =>
          `<tr><td>${escapeHtml(line.description)}</td>` +
          `<td class="num">${escapeHtml(line.quantity)}</td>` +
          `<td class="num">${escapeHtml(formatAmount(line.unitPrice))}</td>` +
          `<td class="num">${escapeHtml(formatAmount(line.discount))}</td>` +
          `<td class="num">${escapeHtml(formatAmount(line.lineTotal))}</td></tr>`,
      )
      .join('');

    const money = (value: string) => `${escapeHtml(value)} ${escapeHtml(snapshot.currency)}`;
    const company = [branding.companyName, ...branding.addressLines, branding.email, branding.taxNumber]
      .filter((line): line is string => Boolean(line))
      .map((line) => `<div>${escapeHtml(line)}</div>`)
      .join('');
    const client = [
      snapshot.client.name,
      snapshot.client.address,
      snapshot.client.email,
      snapshot.client.taxNumber,
    ]
      .filter((line): line is string => Boolean(line))
      .map((line) => `<div>${escapeHtml(line)}</div>`)
      .join('');

    return [
      '<!DOCTYPE html>',
      '<html><head><meta charset="utf-8">',
      `<title>${escapeHtml(`${title} ${snapshot.number}`)}</title>`,
      '<style>',
      `:root { ${cssColorVariables('primary', primary)} ${cssColorVariables('accent', accent)} }`,
      `body { font-family: '${cssFontName(branding.fontFamily)}', Helvetica, sans-serif; font-size: ${layout.bodySize + 3}px; }`,
      'header { color: rgb(var(--primary-r), var(--primary-g), var(--primary-b)); }',
      '.num { text-align: right; }',
      '</style></head>',
      `<body class="template-${layout.id}">`,
      `<header class="header-${layout.header}"><h1>${escapeHtml(title)}</h1>`,
      `<div class="monogram">${escapeHtml(monogram(branding.companyName))}</div></header>`,
      `<section class="from">${company}</section>`,
      `<section class="to">${client}</section>`,
      `<dl><dt>Number</dt><dd>${escapeHtml(snapshot.number)}</dd>`,
      `<dt>Issue date</dt><dd>${escapeHtml(snapshot.issueDate)}</dd>`,
      snapshot.dueDate ? `<dt>Due date</dt><dd>${escapeHtml(snapshot.dueDate)}</dd>` : '',
      '</dl>',
      '<table><thead><tr><th>Description</th><th>Qty</th><th>Unit price</th><th>Discount</th><th>Amount</th></tr></thead>',
      `<tbody>${rows}</tbody></table>`,
      `<dl class="totals"><dt>Subtotal</dt><dd>${money(snapshot.subtotal)}</dd>`,
      `<dt>Tax (${escapeHtml(snapshot.taxRate)}%)</dt><dd>${money(snapshot.taxTotal)}</dd>`,
      `<dt>Total</dt><dd>${money(snapshot.total)}</dd></dl>`,
      snapshot.notes ? `<p class="notes">${escapeHtml(snapshot.notes)}</p>` : '',
      '</body></html>',
    ].join('\n');
  }

  private async resolveAssets(
    branding: BrandingSnapshot,
  ): Promise<Pick<ResolvedBranding, 'fonts' | 'fontBytes' | 'logo'>> {
    let logo: Buffer | null = null;
    if (branding.logoPath) {
      const bytes = await this.assets.load(branding.logoPath);
      if (!bytes) {
        this.logger.warn('Logo not found, using placeholder', { logoPath: branding.logoPath });
      } else if (!detectImageFormat(bytes)) {
        this.logger.warn('Logo is not PNG or JPEG, using placeholder', { logoPath: branding.logoPath });
      } else {
        logo = bytes;
      }
    }

    if (branding.fontPath) {
      const bytes = await this.assets.load(branding.fontPath);
      if (bytes && isFontFile(bytes)) {
        return { fonts: { regular: BRAND_FONT, bold: BRAND_FONT }, fontBytes: bytes, logo };
      }
      this.logger.warn('Font not usable, falling back to Helvetica', { fontPath: branding.fontPath });
      return { fonts: FALLBACK_FONT, fontBytes: null, logo };
    }

    const standard = STANDARD_FONTS[branding.fontFamily];
    if (!standard) {
      this.logger.warn('Unknown font family, falling back to Helvetica', {
        fontFamily: branding.fontFamily,
      });
    }
    return { fonts: standard ?? FALLBACK_FONT, fontBytes: null, logo };
  }

  private draw(
    snapshot: DocumentSnapshot,
    layout: TemplateLayout,
    branding: BrandingSnapshot,
    resolved: ResolvedBranding,
  ): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      const chunks: Buffer[] = [];
      const timestamp = new Date(snapshot.createdAt);

      try {
        const doc = new PDFDocument({
          size: 'A4',
          margin: layout.margin,
          info: {
            Title: `${documentTitle(snapshot)} ${snapshot.number}`,
            Author: branding.companyName,
            Subject: `${snapshot.documentId} v${snapshot.version}`,
            Producer: 'billvault',
            Creator: 'billvault',
            CreationDate: timestamp,
            ModDate: timestamp,
          },
        });

        doc.on('data', (chunk: Buffer) => chunks.push(chunk));
        doc.on('end', () => resolve(Buffer.concat(chunks)));
        doc.on('error', (error: unknown) => reject(new RenderError('PDF engine failed', error)));

        if (resolved.fontBytes) {
          doc.registerFont(BRAND_FONT, resolved.fontBytes);
        }
        drawDocument(doc, snapshot, layout, branding, resolved);
        doc.end();
      } catch (error) {
        this.logger.error('Render failed', { documentId: snapshot.documentId, error: errorMessage(error) });
        reject(error instanceof BillingError ? error : new RenderError('Failed to draw document', error));
      }
    });
  }
}

function drawDocument(
  doc: PDFKit.PDFDocument,
  snapshot: DocumentSnapshot,
  layout: TemplateLayout,
  branding: BrandingSnapshot,
  resolved: ResolvedBranding,
): void {
  const { primary, accent, fonts } = resolved;
  const margin = layout.margin;
  const width = doc.page.width;
  const contentWidth = width - margin * 2;
  const title = documentTitle(snapshot);

  // Header
  let titleColor: RGB = primary;
  if (layout.header === 'band') {
    doc.rect(0, 0, width, 96).fill(primary);
    titleColor = WHITE;
  } else if (layout.header === 'bar') {
    doc.rect(0, 0, width, 8).fill(accent);
  }

  const logoSize = 48;
  if (resolved.logo) {
    doc.image(resolved.logo, margin, 24, { fit: [logoSize * 3, logoSize] });
  } else {
    drawMonogram(doc, branding.companyName, margin, 24, logoSize, primary, accent, fonts.bold);
  }

  doc.font(fonts.bold).fontSize(layout.titleSize).fillColor(titleColor);
  doc.text(title, margin, 36, { width: contentWidth, align: 'right', lineBreak: false });

  // Parties
  let y = 120;
  const half = contentWidth / 2 - 12;
  doc.font(fonts.bold).fontSize(layout.bodySize + 1).fillColor(TEXT_COLOR);
  doc.text('From', margin, y, { width: half, lineBreak: false });
  doc.text('Bill To', margin + half + 24, y, { width: half, lineBreak: false });
  y += 16;

  doc.font(fonts.regular).fontSize(layout.bodySize);
  const fromLines = [branding.companyName, ...branding.addressLines, branding.email, branding.taxNumber];
  const toLines = [snapshot.client.name, snapshot.client.address, snapshot.client.email, snapshot.client.taxNumber];
  const fromEnd = drawLines(doc, compact(fromLines), margin, y, half);
  const toEnd = drawLines(doc, compact(toLines), margin + half + 24, y, half);
  y = Math.max(fromEnd, toEnd) + 16;

  // Meta strip
  doc.moveTo(margin, y).lineTo(width - margin, y).strokeColor(accent).lineWidth(1).stroke();
  y += 10;
  const meta: Array<[string, string]> = [
    ['Number', snapshot.number],
    ['Issue date', snapshot.issueDate],
  ];
  if (snapshot.dueDate) meta.push(['Due date', snapshot.dueDate]);
  meta.push(['Currency', snapshot.currency]);

  const metaWidth = contentWidth / meta.length;
  meta.forEach(([label, value], index) => {
    const x = margin + metaWidth * index;
    doc.font(fonts.bold).fontSize(layout.bodySize - 1).fillColor(MUTED_COLOR);
    doc.text(label, x, y, { width: metaWidth, lineBreak: false });
    doc.font(fonts.regular).fontSize(layout.bodySize).fillColor(TEXT_COLOR);
    doc.text(value, x, y + 12, { width: metaWidth, lineBreak: false });
  });
  y += 40;

  // Line items
  const columns = [
    { label: 'Description', width: contentWidth * 0.4, align: 'left' as const },
    { label: 'Qty', width: contentWidth * 0.12, align: 'right' as const },
    { label: 'Unit price', width: contentWidth * 0.16, align: 'right' as const },
    { label: 'Discount', width: contentWidth * 0.14, align: 'right' as const },
    { label: 'Amount', width: contentWidth * 0.18, align: 'right' as const },
  ];
  const rowHeight = layout.bodySize + 10;

  const drawRow = (cells: string[], top: number, bold: boolean) => {
    let x = margin;
    doc.font(bold ? fonts.bold : fonts.regular).fontSize(layout.bodySize).fillColor(bold ? WHITE : TEXT_COLOR);
    columns.forEach((column, index) => {
      doc.text(cells[index] ?? '', x + 4, top + 5, {
        width: column.width - 8,
        align: column.align,
        lineBreak: false,
        ellipsis: true,
      });
      x += column.width;
    });
  };

  doc.rect(margin, y, contentWidth, rowHeight).fill(primary);
  drawRow(
    columns.map((c) => c.label),
    y,
    true,
  );
  y += rowHeight;

  snapshot.lineItems.forEach((line, index) => {
    if (y + rowHeight > doc.page.height - margin - 100) {
      doc.addPage();
      y = margin;
    }
    if (layout.stripedRows && index % 2 === 1) {
      doc.rect(margin, y, contentWidth, rowHeight).fillOpacity(0.15).fill(accent).fillOpacity(1);
    }
    drawRow(
      [
        line.description,
        line.quantity,
        formatAmount(line.unitPrice),
        formatAmount(line.discount),
        formatAmount(line.lineTotal),
      ],
      y,
      false,
    );
    y += rowHeight;
  });

  // Totals
  y += 12;
  const labelX = margin + contentWidth * 0.55;
  const labelWidth = contentWidth * 0.25;
  const valueX = labelX + labelWidth;
  const valueWidth = contentWidth * 0.2;
  const totals: Array<[string, string, boolean]> = [
    ['Subtotal', snapshot.subtotal, false],
    [`Tax (${snapshot.taxRate}%)`, snapshot.taxTotal, false],
    ['Total', snapshot.total, true],
  ];
  for (const [label, amount, bold] of totals) {
    doc.font(bold ? fonts.bold : fonts.regular).fontSize(layout.bodySize + (bold ? 2 : 0));
    doc.fillColor(bold ? primary : TEXT_COLOR);
    doc.text(label, labelX, y, { width: labelWidth, lineBreak: false });
    doc.text(`${formatAmount(amount)} ${snapshot.currency}`, valueX, y, {
      width: valueWidth,
      align: 'right',
      lineBreak: false,
    });
    y += layout.bodySize + 8;
  }

  if (snapshot.notes) {
    y += 16;
    doc.font(fonts.regular).fontSize(layout.bodySize - 1).fillColor(MUTED_COLOR);
    doc.text(snapshot.notes, margin, y, { width: contentWidth });
  }
}

function drawMonogram(
  doc: PDFKit.PDFDocument,
  companyName: string,
  x: number,
  y: number,
  size: number,
  primary: RGB,
  accent: RGB,
  font: string,
): void {
  const radius = size / 2;
  doc.circle(x + radius, y + radius, radius).fill(accent);
  doc.font(font).fontSize(size * 0.5).fillColor(primary);
  doc.text(monogram(companyName), x, y + size * 0.25, { width: size, align: 'center', lineBreak: false });
}

function drawLines(doc: PDFKit.PDFDocument, lines: string[], x: number, y: number, width: number): number {
  let current = y;
  for (const line of lines) {
    doc.text(line, x, current, { width, lineBreak: false, ellipsis: true });
    current += 14;
  }
  return current;
}

function compact(values: Array<string | null | undefined>): string[] {
  return values.filter((value): value is string => Boolean(value && value.trim()));
}

// Style blocks are raw text, so entity escaping does not apply there
function cssFontName(fontFamily: string): string {
  return fontFamily.replace(/[^A-Za-z0-9 _-]/g, '');
}

function monogram(companyName: string): string {
  return companyName.trim().charAt(0).toUpperCase() || '?';
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new RenderTimeoutError(timeoutMs)), timeoutMs);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

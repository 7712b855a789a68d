import { fileURLToPath } from 'node:url';
import type { jsPDF } from 'jspdf';
import type { UserOptions } from 'jspdf-autotable';
import type { MemberReportDocument, ReportChart, ReportTable } from '@charity-ledger/shared';
import { createLogger, toErrorMessage } from '@charity-ledger/shared';
import { CapabilityUnavailableError } from '../../errors';
import { readBase64IfExists, readTextIfExists } from '../../utils/files';
import { isRecord, parseJsonObject } from '../../utils/values';
import { formatShare, slicePolygon, type Point } from './charts';

const logger = createLogger('pdf');

export interface PdfEngine {
  createDocument: () => jsPDF;
  autoTable: (doc: jsPDF, options: UserOptions) => void;
}

export type PdfEngineLoader = () => Promise<PdfEngine>;

// unicodeText: a Unicode font is loaded, so text beyond Latin-1 renders.
export type PdfCapability = { available: true; unicodeText: boolean } | { available: false; reason: string };

export interface PdfService {
  capability: () => Promise<PdfCapability>;
  render: (report: MemberReportDocument) => Promise<Buffer>;
}

function isJsPdfConstructor(value: unknown): value is typeof jsPDF {
  return typeof value === 'function';
}

function isAutoTable(value: unknown): value is PdfEngine['autoTable'] {
  return typeof value === 'function';
}

// CommonJS builds arrive through import() wrapped once more under `default`.
function findExport(module: unknown, name: string): unknown {
  if (!isRecord(module)) return undefined;
  if (typeof module[name] === 'function') return module[name];
  return isRecord(module.default) ? module.default[name] : undefined;
}

export const loadJsPdfEngine: PdfEngineLoader = async () => {
  const [jsPdfModule, autoTableModule] = await Promise.all([import('jspdf'), import('jspdf-autotable')]);
  const JsPdf = findExport(jsPdfModule, 'jsPDF');
  const autoTable = findExport(autoTableModule, 'default');
  if (!isJsPdfConstructor(JsPdf) || !isAutoTable(autoTable)) {
    throw new Error('jspdf or jspdf-autotable did not load');
  }
  return {
    createDocument: () => new JsPdf({ unit: 'pt', format: 'a4' }),
    autoTable,
  };
};

export interface ReportQuotes {
  heading: string;
  quotes: string[];
}

export interface RenderOptions {
  // Base64 TrueType data registered as the document font.
  font?: string;
  // Drawn only with a Unicode font.
  quotes?: ReportQuotes;
}

export interface PdfServiceOptions {
  loadEngine?: PdfEngineLoader;
  fontFile?: string;
  quotesFile?: string;
}

const DEFAULT_QUOTES_FILE = fileURLToPath(new URL('./quotes.json', import.meta.url));

export function loadReportQuotes(file = DEFAULT_QUOTES_FILE): ReportQuotes | null {
  const text = readTextIfExists(file);
  const document = text === null ? null : parseJsonObject(text);
  if (!document || typeof document.heading !== 'string' || !Array.isArray(document.quotes)) {
    logger.warn(`no report quotes in ${file}`);
    return null;
  }
  const entries: unknown[] = document.quotes;
  const quotes = entries.filter((quote): quote is string => typeof quote === 'string' && quote.trim() !== '');
  return quotes.length ? { heading: document.heading, quotes } : null;
}

// The built-in Helvetica only encodes Latin-1.
const OUTSIDE_LATIN1 = /[^\x00-\xff]/;

export function findTextOutsideLatin1(report: MemberReportDocument): string | null {
  const tables = [report.memberTable, report.organizationTable];
  const texts = [
    report.title,
    report.lifetimeHighlight,
    report.headerMessage ?? '',
    report.footerMessage ?? '',
    report.chartsHeading,
    report.signature,
    ...report.profile.flatMap((line) => [line.label, line.value]),
    ...tables.flatMap((table) => [table.title, ...table.head, ...table.rows.flat()]),
    ...report.charts.flatMap((chart) => [chart.title, ...chart.slices.map((slice) => slice.label)]),
  ];
  return texts.find((text) => OUTSIDE_LATIN1.test(text)) ?? null;
}

const FONT_FILE_NAME = 'report-font.ttf';
const FONT_FAMILY = 'ReportFont';
const BUILT_IN_FAMILY = 'helvetica';

// One face serves every style.
function registerFont(doc: jsPDF, data: string): void {
  doc.addFileToVFS(FONT_FILE_NAME, data);
  for (const style of ['normal', 'bold', 'italic']) {
    doc.addFont(FONT_FILE_NAME, FONT_FAMILY, style);
  }
}

const MARGIN = 40;
const LINE_HEIGHT = 15;
const CHART_HEIGHT = 190;
const HEADER_GREEN: [number, number, number] = [0, 100, 0];
const HEADER_NAVY: [number, number, number] = [0, 0, 128];

class PageWriter {
  y = MARGIN;
  readonly width: number;
  readonly height: number;

  constructor(
    readonly doc: jsPDF,
    readonly family: string,
  ) {
    this.width = doc.internal.pageSize.getWidth();
    this.height = doc.internal.pageSize.getHeight();
  }

  get contentWidth(): number {
    return this.width - MARGIN * 2;
  }

  ensureSpace(needed: number): void {
    if (this.y + needed > this.height - MARGIN) {
      this.doc.addPage();
      this.y = MARGIN;
    }
  }

  gap(size: number): void {
    this.y += size;
  }

  paragraph(text: string, style: 'normal' | 'bold' | 'italic' = 'normal', fontSize = 10): void {
    this.doc.setFont(this.family, style);
    this.doc.setFontSize(fontSize);
    const lines: string[] = this.doc.splitTextToSize(text, this.contentWidth);
    const lineHeight = Math.max(LINE_HEIGHT, fontSize * 1.4);
    for (const line of lines) {
      this.ensureSpace(lineHeight);
      this.doc.text(line, MARGIN, this.y);
      this.y += lineHeight;
    }
  }

  labelled(label: string, value: string): void {
    this.ensureSpace(LINE_HEIGHT);
    this.doc.setFontSize(10);
    this.doc.setFont(this.family, 'bold');
    const labelText = `${label}: `;
    this.doc.text(labelText, MARGIN, this.y);
    this.doc.setFont(this.family, 'normal');
    this.doc.text(value, MARGIN + this.doc.getTextWidth(labelText), this.y);
    this.y += LINE_HEIGHT;
  }
}

function drawTable(writer: PageWriter, engine: PdfEngine, table: ReportTable, headColor: [number, number, number]) {
  writer.ensureSpace(LINE_HEIGHT * 4);
  writer.paragraph(table.title, 'bold', 12);

  let finalY = writer.y;
  const lastRow = table.rows.length - 1;
  engine.autoTable(writer.doc, {
    startY: writer.y,
    head: [table.head],
    body: table.rows,
    theme: 'grid',
    tableWidth: 350,
    margin: { left: MARGIN, right: MARGIN },
    styles: { font: writer.family, fontSize: 9, lineColor: [0, 0, 0], lineWidth: 0.5 },
    headStyles: { fillColor: headColor, textColor: [245, 245, 245] },
    columnStyles: { 1: { halign: 'right' } },
    didParseCell: (data) => {
      if (data.section === 'body' && data.row.index === lastRow) {
        data.cell.styles.fontStyle = 'bold';
      }
    },
    didDrawPage: (data) => {
      finalY = data.cursor?.y ?? finalY;
    },
  });

  writer.y = finalY;
  writer.gap(20);
}

function drawChart(writer: PageWriter, chart: ReportChart, left: number, top: number, width: number): void {
  const { doc } = writer;
  doc.setFont(writer.family, 'bold');
  doc.setFontSize(11);
  doc.text(chart.title, left + width / 2, top + 12, { align: 'center' });

  const radius = 55;
  const center: Point = { x: left + radius + 10, y: top + 30 + radius };
  for (const slice of chart.slices) {
    const points = slicePolygon(slice, center, radius);
    const segments = points.slice(1).map((point, index) => [point.x - points[index].x, point.y - points[index].y]);
    doc.setFillColor(slice.color[0], slice.color[1], slice.color[2]);
    doc.lines(segments, points[0].x, points[0].y, [1, 1], 'F', true);
  }

  doc.setFont(writer.family, 'normal');
  doc.setFontSize(8);
  const legendLeft = center.x + radius + 15;
  chart.slices.forEach((slice, index) => {
    const rowY = top + 30 + index * 12;
    doc.setFillColor(slice.color[0], slice.color[1], slice.color[2]);
    doc.rect(legendLeft, rowY - 7, 8, 8, 'F');
    doc.text(`${slice.label} (${formatShare(slice.share)})`, legendLeft + 12, rowY);
  });
}

function drawCharts(writer: PageWriter, report: MemberReportDocument): void {
  if (!report.charts.length) return;

  writer.ensureSpace(LINE_HEIGHT * 2 + CHART_HEIGHT);
  writer.paragraph(report.chartsHeading, 'bold', 12);
  writer.gap(5);

  // Fund and usage side by side; anything after that gets its own row.
  const [first, second, ...rest] = report.charts;
  const half = writer.contentWidth / 2;
  writer.ensureSpace(CHART_HEIGHT);
  drawChart(writer, first, MARGIN, writer.y, second ? half : writer.contentWidth);
  if (second) {
    drawChart(writer, second, MARGIN + half, writer.y, half);
  }
  writer.gap(CHART_HEIGHT);

  for (const chart of rest) {
    writer.ensureSpace(CHART_HEIGHT);
    drawChart(writer, chart, MARGIN, writer.y, writer.contentWidth);
    writer.gap(CHART_HEIGHT);
  }
}

function drawQuotes(writer: PageWriter, quotes: ReportQuotes): void {
  writer.gap(10);
  writer.ensureSpace(LINE_HEIGHT * 3);
  writer.paragraph(quotes.heading, 'bold');
  writer.gap(5);
  for (const quote of quotes.quotes) {
    writer.paragraph(quote);
    writer.gap(8);
  }
  writer.gap(12);
}

export function renderMemberReport(
  engine: PdfEngine,
  report: MemberReportDocument,
  options: RenderOptions = {},
): Buffer {
  if (!options.font) {
    const unsupported = findTextOutsideLatin1(report);
    if (unsupported !== null) {
      throw new CapabilityUnavailableError('pdf', `"${unsupported}" needs a Unicode font; set REPORT_FONT_FILE`);
    }
  }

  const doc = engine.createDocument();
  if (options.font) {
    registerFont(doc, options.font);
  }
  const writer = new PageWriter(doc, options.font ? FONT_FAMILY : BUILT_IN_FAMILY);

  doc.setFont(writer.family, 'bold');
  doc.setFontSize(18);
  doc.text(report.title, writer.width / 2, writer.y, { align: 'center' });
  writer.gap(30);

  for (const line of report.profile) {
    writer.labelled(line.label, line.value);
  }
  writer.gap(10);

  doc.setTextColor(0, 0, 139);
  writer.paragraph(report.lifetimeHighlight, 'bold', 12);
  doc.setTextColor(0, 0, 0);
  writer.gap(10);

  if (report.headerMessage) {
    writer.paragraph(report.headerMessage, 'italic');
    writer.gap(10);
  }

  drawTable(writer, engine, report.memberTable, HEADER_GREEN);
  drawTable(writer, engine, report.organizationTable, HEADER_NAVY);
  drawCharts(writer, report);
  if (options.font && options.quotes) {
    drawQuotes(writer, options.quotes);
  }

  if (report.footerMessage) {
    writer.paragraph(report.footerMessage);
    writer.gap(25);
  }

  writer.ensureSpace(LINE_HEIGHT * 3);
  writer.paragraph('_'.repeat(30));
  writer.paragraph(report.signature);

  return Buffer.from(doc.output('arraybuffer'));
}

function readFont(file: string): string | null {
  try {
    const data = readBase64IfExists(file);
    if (data === null) {
      logger.warn(`report font ${file} not found, text is limited to Latin-1`);
    }
    return data;
  } catch (error) {
    logger.warn(`report font ${file} unreadable, text is limited to Latin-1: ${toErrorMessage(error)}`);
    return null;
  }
}

export function createPdfService(options: PdfServiceOptions = {}): PdfService {
  const loadEngine = options.loadEngine ?? loadJsPdfEngine;
  let engine: Promise<PdfEngine | null> | null = null;
  let unavailableReason = '';
  let renderOptions: RenderOptions = {};

  const resolveEngine = (): Promise<PdfEngine | null> => {
    if (!engine) {
      engine = loadEngine().then(
        (loaded) => {
          const font = options.fontFile ? readFont(options.fontFile) : null;
          renderOptions = font ? { font, quotes: loadReportQuotes(options.quotesFile) ?? undefined } : {};
          return loaded;
        },
        (error: unknown) => {
          unavailableReason = toErrorMessage(error);
          logger.warn(`PDF export disabled: ${unavailableReason}`);
          return null;
        },
      );
    }
    return engine;
  };

  return {
    capability: async () => {
      const loaded = await resolveEngine();
      return loaded
        ? { available: true, unicodeText: renderOptions.font !== undefined }
        : { available: false, reason: unavailableReason };
    },
    render: async (report) => {
      const loaded = await resolveEngine();
      if (!loaded) {
        throw new CapabilityUnavailableError('pdf', unavailableReason);
      }
      return renderMemberReport(loaded, report, renderOptions);
    },
  };
}

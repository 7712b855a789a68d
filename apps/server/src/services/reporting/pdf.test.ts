import fs from 'node:fs';
import path from 'node:path';
import type { jsPDF } from 'jspdf';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CapabilityUnavailableError } from '../../errors';
import { makeRecord, makeTempDir, removeDir } from '../../testing/fixtures';
import { pivotByMonthAndCategory } from '../ledger/aggregator';
import { EMPTY_PROFILE } from '../members/directory';
import { buildMemberReport } from './builder';
import { createPdfService, findTextOutsideLatin1, loadJsPdfEngine, loadReportQuotes, type PdfEngineLoader } from './pdf';

function sampleReport(memberName = 'Karim', currency = 'Tk ') {
  const outgoing = [
    makeRecord({ date: '2024-02-05', type: 'Outgoing', category: 'Zakat', subCategory: 'Medical help', medical: 'Heart', amount: 30 }),
    makeRecord({ date: '2024-04-11', type: 'Outgoing', category: 'Sadaka', subCategory: 'Food help', amount: 45 }),
  ];
  return buildMemberReport({
    memberName,
    profile: { ...EMPTY_PROFILE, email: 'karim@example.org' },
    year: 2024,
    memberSince: '2023-05-02',
    lifetimeTotal: 140,
    memberPivot: pivotByMonthAndCategory([makeRecord({ date: '2024-01-10', amount: 100 })]),
    organizationOutgoing: outgoing,
    medicalOutgoing: outgoing.slice(0, 1),
    currency,
    headerMessage: 'Thank you for your support.',
    footerMessage: 'May your giving be accepted.',
  });
}

// Font calls are stubbed: the test font file holds no real TrueType data.
function trackFontCalls(doc: jsPDF) {
  return {
    addFileToVFS: vi.spyOn(doc, 'addFileToVFS').mockReturnValue(doc),
    addFont: vi.spyOn(doc, 'addFont').mockReturnValue('ReportFont'),
    setFont: vi.spyOn(doc, 'setFont').mockReturnValue(doc),
    text: vi.spyOn(doc, 'text'),
  };
}

describe('pdf service', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dataDir);
  });

  it('reports the capability as unavailable when the engine cannot load', async () => {
    const loader = vi.fn(async () => {
      throw new Error('jspdf is not installed');
    });
    const service = createPdfService({ loadEngine: loader });

    expect(await service.capability()).toEqual({ available: false, reason: 'jspdf is not installed' });
    await expect(service.render(sampleReport())).rejects.toBeInstanceOf(CapabilityUnavailableError);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('renders a member report with jsPDF', async () => {
    const service = createPdfService();
    expect(await service.capability()).toEqual({ available: true, unicodeText: false });

    const pdf = await service.render(sampleReport());
    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(pdf.length).toBeGreaterThan(1000);
  });

  it('refuses text beyond Latin-1 without a Unicode font', async () => {
    const service = createPdfService();
    await expect(service.render(sampleReport('করিম', '৳'))).rejects.toThrow(
      'pdf is unavailable: "LIFETIME CONTRIBUTIONS: ৳140.00" needs a Unicode font; set REPORT_FONT_FILE',
    );
  });

  it('falls back to the built-in font when the font file is missing', async () => {
    const service = createPdfService({ fontFile: path.join(dataDir, 'missing.ttf') });
    expect(await service.capability()).toEqual({ available: true, unicodeText: false });
    await expect(service.render(sampleReport('করিম'))).rejects.toThrow('"করিম" needs a Unicode font');
  });

  it('registers the configured font for every style and adds the quotes', async () => {
    const fontFile = path.join(dataDir, 'report.ttf');
    fs.writeFileSync(fontFile, 'test-font');
    const tracked: ReturnType<typeof trackFontCalls>[] = [];
    const loadEngine: PdfEngineLoader = async () => {
      const engine = await loadJsPdfEngine();
      return {
        autoTable: engine.autoTable,
        createDocument: () => {
          const doc = engine.createDocument();
          tracked.push(trackFontCalls(doc));
          return doc;
        },
      };
    };

    const service = createPdfService({ loadEngine, fontFile });
    expect(await service.capability()).toEqual({ available: true, unicodeText: true });
    const pdf = await service.render(sampleReport('করিম', '৳'));
    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');

    expect(tracked).toHaveLength(1);
    const calls = tracked[0];
    expect(calls.addFileToVFS).toHaveBeenCalledWith('report-font.ttf', Buffer.from('test-font').toString('base64'));
    expect(calls.addFont.mock.calls).toEqual([
      ['report-font.ttf', 'ReportFont', 'normal'],
      ['report-font.ttf', 'ReportFont', 'bold'],
      ['report-font.ttf', 'ReportFont', 'italic'],
    ]);
    expect(calls.setFont).toHaveBeenCalledWith('ReportFont', 'bold');
    expect(calls.text.mock.calls.map((call) => call[0])).toContain('Inspirational Quotes:');
  });
});

describe('report text checks', () => {
  it('finds the first text the built-in font cannot encode', () => {
    expect(findTextOutsideLatin1(sampleReport('José'))).toBeNull();
    expect(findTextOutsideLatin1({ ...sampleReport(), footerMessage: 'জাযাকাল্লাহ' })).toBe('জাযাকাল্লাহ');
  });

  it('loads the bundled quotes', () => {
    const quotes = loadReportQuotes();
    expect(quotes?.heading).toBe('Inspirational Quotes:');
    expect(quotes?.quotes).toHaveLength(2);
  });
});

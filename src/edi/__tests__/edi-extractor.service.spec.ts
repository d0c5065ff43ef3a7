import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { EdiSegment, RawTable } from '../interfaces/edi.interfaces';
import { ExtractionTimeoutError, NoSegmentsFoundError, SourceUnreadableError } from '../errors/edi.errors';
import { EdiExtractorService, requireSegments, sortSegments } from '../services/edi-extractor.service';
import { FormatDetectorService } from '../services/format-detector.service';
import { FaureciaTableParserService } from '../services/faurecia-table-parser.service';
import { Vda4932TableParserService } from '../services/vda4932-table-parser.service';
import { SegmentEnricherService } from '../services/segment-enricher.service';
import { StatisticsService } from '../services/statistics.service';
import { PdfService } from '../../pdf/pdf.service';
import { MaterializedSourceDocument } from '../../pdf/source-document';

function row(code: string, description: string, format = '', value = '', usage = ''): string[] {
  return [code, description, '', '', format, '', value, usage];
}

const UNH_TABLE: RawTable = [
  ['Segment: UNH', 'Pos.: 0010', 'Level: 0'],
  row('0062', 'Message reference number', 'an..14'),
  row('S009', 'Message identifier'),
  row('0065', 'Message type', 'an..6', 'DELFOR'),
  row('0052', 'Message version number', 'an..3', 'D'),
];

const BGM_TABLE: RawTable = [
  ['Segment: BGM', 'Pos.: 0020', 'Level: 0', 'Beginning of message'],
  row('C002', 'Document/message name'),
  row('1001', 'Document name code', 'an..3', '241'),
  row('1225', 'Message function code', 'an..3', '9', '9 = Original'),
  row('', '', '', '', '5 = Replace'),
];

const FAURECIA_DOCUMENT = MaterializedSourceDocument.fromPages([
  { text: 'Segment: UNH Pos.: 0010 Level: 0', tables: [UNH_TABLE] },
  { text: 'Segment: BGM Pos.: 0020 Level: 0 Beginning of message', tables: [BGM_TABLE] },
]);

const VDA_DOCUMENT = MaterializedSourceDocument.fromPages([
  {
    text: 'Segment: NAD Cons. No.: 14 Level: 1 Name and address',
    tables: [
      [
        ['3035 Party qualifier', 'an..3', 'SU', 'SU = Supplier'],
        ['3039 Party identifier', 'an..35', '', ''],
        ['3164 City name', 'an..35', '', ''],
      ],
    ],
  },
]);

describe('EdiExtractorService', () => {
  let service: EdiExtractorService;
  let pdfService: { loadFile: jest.Mock; loadBuffer: jest.Mock };

  async function createService(config: Record<string, number> = {}): Promise<EdiExtractorService> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        EdiExtractorService,
        FormatDetectorService,
        FaureciaTableParserService,
        Vda4932TableParserService,
        SegmentEnricherService,
        StatisticsService,
        {
          provide: PdfService,
          useValue: pdfService,
        },
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string) => config[key]),
          },
        },
      ],
    }).compile();

    return module.get<EdiExtractorService>(EdiExtractorService);
  }

  beforeEach(async () => {
    pdfService = {
      loadFile: jest.fn(),
      loadBuffer: jest.fn(),
    };
    service = await createService();
  });

  // ============================================================================
  // extract
  // ============================================================================

  describe('extract', () => {
    it('should parse a Faurecia document and sort segments by code', () => {
      const result = service.extract(FAURECIA_DOCUMENT, 'DELFOR.pdf');

      expect(result.source).toBe('DELFOR.pdf');
      expect(result.convention).toBe('faurecia');
      expect(result.segments.map((segment) => segment.code)).toEqual(['BGM', 'UNH']);
    });

    it('should enrich segments whose header has no description', () => {
      const result = service.extract(FAURECIA_DOCUMENT);

      expect(result.source).toBe('document');
      expect(result.segments.map((segment) => segment.description)).toEqual([
        'Beginning of message',
        'Message header',
      ]);
    });

    it('should compute statistics on the parsed tree', () => {
      expect(service.extract(FAURECIA_DOCUMENT).statistics).toEqual({
        segments: 2,
        totalElements: 3,
        simpleElements: 1,
        groups: 2,
        elementsInGroups: 4,
        totalFields: 5,
        elementsWithFormat: 5,
        elementsWithValue: 4,
        elementsWithUsage: 1,
      });
    });

    it('should keep consolidated usage on the owning element', () => {
      const bgm = service.extract(FAURECIA_DOCUMENT).segments[0];
      const group = bgm.elements[0];

      expect(group.kind).toBe('group');
      if (group.kind === 'group') {
        expect(group.elements[1]).toMatchObject({ code: '1225', usage: '9 = Original\n5 = Replace' });
      }
    });

    it('should dispatch VDA 4932 documents to the VDA parser', () => {
      const result = service.extract(VDA_DOCUMENT, 'VDA.pdf');

      expect(result.convention).toBe('vda4932');
      expect(result.segments).toHaveLength(1);
      expect(result.segments[0].elements.map((entry) => entry.code)).toEqual(['3035', '3039', '3164']);
    });

    it('should return an empty result for a document without segments', () => {
      const result = service.extract(MaterializedSourceDocument.fromPages([{ text: 'Introduction' }]), 'empty.pdf');

      expect(result.segments).toEqual([]);
      expect(() => requireSegments(result)).toThrow(NoSegmentsFoundError);
      expect(() => requireSegments(result)).toThrow('Aucun segment trouvé dans empty.pdf');
    });

    it('should not share state between documents', () => {
      service.extract(FAURECIA_DOCUMENT);
      const result = service.extract(VDA_DOCUMENT);

      expect(result.segments.map((segment) => segment.code)).toEqual(['NAD']);
    });
  });

  describe('sortSegments', () => {
    it('should order segments by code in strictly ascending order', () => {
      const segments = new Map(
        ['UNT', 'BGM', 'NAD', 'DTM'].map((code): [string, EdiSegment] => [code, { code, description: '', elements: [] }]),
      );

      expect(sortSegments(segments).map((segment) => segment.code)).toEqual(['BGM', 'DTM', 'NAD', 'UNT']);
    });
  });

  // ============================================================================
  // extractFile / extractBuffer
  // ============================================================================

  describe('extractFile', () => {
    it('should load the PDF and name the result after the file', async () => {
      pdfService.loadFile.mockResolvedValue(FAURECIA_DOCUMENT);

      const result = await service.extractFile('/data/schema/DELFOR D96A.pdf');

      expect(pdfService.loadFile).toHaveBeenCalledWith('/data/schema/DELFOR D96A.pdf');
      expect(result.source).toBe('DELFOR D96A.pdf');
      expect(result.segments).toHaveLength(2);
    });

    it('should propagate unreadable documents', async () => {
      pdfService.loadFile.mockRejectedValue(new SourceUnreadableError('broken.pdf', new Error('Invalid PDF structure')));

      await expect(service.extractFile('broken.pdf')).rejects.toThrow(
        'Document illisible: broken.pdf (Invalid PDF structure)',
      );
    });

    it('should abort a load that exceeds the configured deadline', async () => {
      service = await createService({ 'edi.extractionTimeoutMs': 20 });
      pdfService.loadFile.mockReturnValue(new Promise(() => undefined));

      await expect(service.extractFile('slow.pdf')).rejects.toThrow(ExtractionTimeoutError);
    });

    it('should not apply a deadline when the load completes in time', async () => {
      service = await createService({ 'edi.extractionTimeoutMs': 5000 });
      pdfService.loadFile.mockResolvedValue(VDA_DOCUMENT);

      await expect(service.extractFile('VDA.pdf')).resolves.toMatchObject({ convention: 'vda4932' });
    });
  });

  describe('extractBuffer', () => {
    it('should load the uploaded buffer', async () => {
      const buffer = Buffer.from('%PDF-1.4');
      pdfService.loadBuffer.mockResolvedValue(VDA_DOCUMENT);

      const result = await service.extractBuffer(buffer, 'upload.pdf');

      expect(pdfService.loadBuffer).toHaveBeenCalledWith(buffer, 'upload.pdf');
      expect(result.source).toBe('upload.pdf');
    });
  });
});

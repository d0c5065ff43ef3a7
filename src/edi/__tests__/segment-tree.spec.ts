import { EdiGroup, ParserContext } from '../interfaces/edi.interfaces';
import {
  appendEntry,
  classifyCode,
  createParserContext,
  ensureSegment,
  lastCreatedSegment,
  openSegment,
} from '../services/segment-tree';

function entryRow(code: string, description = '') {
  return { code, description, format: '', value: '', usage: '' };
}

describe('segment-tree', () => {
  let context: ParserContext;

  beforeEach(() => {
    context = createParserContext();
  });

  describe('classifyCode', () => {
    it('should classify 4-digit codes as elements', () => {
      expect(classifyCode('3035')).toBe('element');
    });

    it('should classify S/C codes as groups', () => {
      expect(classifyCode('C082')).toBe('group');
      expect(classifyCode('S001')).toBe('group');
    });

    it('should reject anything else', () => {
      expect(classifyCode('010')).toBeNull();
      expect(classifyCode('X123')).toBeNull();
      expect(classifyCode('30351')).toBeNull();
      expect(classifyCode('')).toBeNull();
    });
  });

  describe('appendEntry', () => {
    it('should drop entries when no segment is open', () => {
      expect(appendEntry(context, entryRow('3035'))).toBeNull();
      expect(context.segments.size).toBe(0);
    });

    it('should put elements directly under the segment before any group', () => {
      openSegment(context, 'NAD', 'Name and address');
      appendEntry(context, entryRow('3035', 'Party qualifier'));

      const nad = context.segments.get('NAD');
      expect(nad?.elements).toEqual([
        { kind: 'element', code: '3035', description: 'Party qualifier', format: '', value: '', usage: '' },
      ]);
    });

    it('should nest elements in the current group', () => {
      openSegment(context, 'NAD', 'Name and address');
      const group = appendEntry(context, entryRow('C082', 'Party identification details'));
      appendEntry(context, entryRow('3039'));
      appendEntry(context, entryRow('1131'));

      expect(group?.kind).toBe('group');
      expect(context.currentGroup).toBe(group);
      expect(context.currentGroup?.elements.map((element) => element.code)).toEqual(['3039', '1131']);
      expect(context.segments.get('NAD')?.elements).toHaveLength(1);
    });

    it('should never nest a group inside another group', () => {
      openSegment(context, 'NAD', '');
      appendEntry(context, entryRow('C082'));
      appendEntry(context, entryRow('C058'));
      appendEntry(context, entryRow('3124'));

      const entries = context.segments.get('NAD')?.elements ?? [];
      expect(entries.map((entry) => entry.code)).toEqual(['C082', 'C058']);

      const groups = entries.filter((entry): entry is EdiGroup => entry.kind === 'group');
      expect(groups[0].elements).toEqual([]);
      expect(groups[1].elements.map((element) => element.code)).toEqual(['3124']);
    });

    it('should ignore unknown codes without touching the tree', () => {
      openSegment(context, 'NAD', '');

      expect(appendEntry(context, entryRow('Status'))).toBeNull();
      expect(context.segments.get('NAD')?.elements).toEqual([]);
    });
  });

  describe('openSegment', () => {
    it('should reopen a known segment without resetting it', () => {
      openSegment(context, 'NAD', 'Name and address');
      appendEntry(context, entryRow('C082'));
      openSegment(context, 'LOC', 'Place/location identification');
      openSegment(context, 'NAD', 'Other description');

      const nad = context.segments.get('NAD');
      expect(nad?.description).toBe('Name and address');
      expect(nad?.elements).toHaveLength(1);
      expect(context.currentSegment).toBe('NAD');
      expect(context.currentGroup).toBeNull();
    });
  });

  describe('lastCreatedSegment', () => {
    it('should return null for an empty map', () => {
      expect(lastCreatedSegment(new Map())).toBeNull();
    });

    it('should follow creation order, not usage order', () => {
      ensureSegment(context.segments, 'NAD', '');
      ensureSegment(context.segments, 'LIN', '');
      ensureSegment(context.segments, 'NAD', '');

      expect(lastCreatedSegment(context.segments)).toBe('LIN');
    });
  });
});

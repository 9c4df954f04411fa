import { describe, it, expect } from '@jest/globals';
import { NumericPolicyError } from '../../src/core/errors.js';
import {
  encodeTable,
  formatCell,
  numericCell,
  parseDelimited,
  parseHeaderedTable,
} from '../../src/emit/csv.js';

describe('Delimited Text Codec', () => {
  describe('formatCell', () => {
    it('should write missing values as empty cells', () => {
      expect(formatCell('SPEED', undefined)).toBe('');
    });

    it('should write numbers in shortest round-trip form', () => {
      expect(formatCell('SPEED', 0.1 + 0.2)).toBe('0.30000000000000004');
      expect(formatCell('SPEED', 1e21)).toBe('1e+21');
      expect(formatCell('SPEED', -0)).toBe('0');
      expect(formatCell('FRAME', 12)).toBe('12');
    });

    it('should refuse non-finite numbers', () => {
      expect(() => formatCell('TORTUOSITY', Number.NaN)).toThrow(NumericPolicyError);
      expect(() => formatCell('TORTUOSITY', Number.POSITIVE_INFINITY)).toThrow(
        'Column TORTUOSITY received non-finite value Infinity'
      );
    });

    it('should quote text that needs it', () => {
      expect(formatCell('NAME', 'plain')).toBe('plain');
      expect(formatCell('NAME', 'a,b')).toBe('"a,b"');
      expect(formatCell('NAME', 'say "hi"')).toBe('"say ""hi"""');
      expect(formatCell('NAME', 'two\nlines')).toBe('"two\nlines"');
    });
  });

  describe('encodeTable', () => {
    it('should write a header, rows and a trailing newline', () => {
      const text = encodeTable({
        columns: ['SUBTRACK_ID', 'SPEED', 'PATH'],
        rows: [
          ['Track_1_Sub_1', 1.5, '1'],
          ['Track_1_Sub_2', undefined, '1>2'],
        ],
      });

      expect(text).toBe('SUBTRACK_ID,SPEED,PATH\nTrack_1_Sub_1,1.5,1\nTrack_1_Sub_2,,1>2\n');
    });

    it('should write only the header for an empty table', () => {
      expect(encodeTable({ columns: ['A', 'B'], rows: [] })).toBe('A,B\n');
    });

    it('should reject a row of the wrong width', () => {
      expect(() => encodeTable({ columns: ['A', 'B'], rows: [[1]] })).toThrow(
        'Row has 1 cells but the table has 2 columns'
      );
    });
  });

  describe('parseDelimited', () => {
    it('should read quoted cells, doubled quotes and CRLF endings', () => {
      const rows = parseDelimited('A,B\r\n"x,y","say ""hi"""\r\n\r\n1,\n');

      expect(rows).toEqual([
        ['A', 'B'],
        ['x,y', 'say "hi"'],
        ['1', ''],
      ]);
    });

    it('should read a last line without a newline', () => {
      expect(parseDelimited('A\n7')).toEqual([['A'], ['7']]);
    });

    it('should read what encodeTable writes', () => {
      const table = { columns: ['ID', 'LABEL'], rows: [[3, 'a "b", c']] };
      expect(parseDelimited(encodeTable(table))).toEqual([
        ['ID', 'LABEL'],
        ['3', 'a "b", c'],
      ]);
    });
  });

  describe('parseHeaderedTable', () => {
    it('should key cells by trimmed header names', () => {
      const { columns, records } = parseHeaderedTable(' ID , FRAME\n1, 4\n2\n');

      expect(columns).toEqual(['ID', 'FRAME']);
      expect(records[0]?.get('FRAME')).toBe('4');
      expect(records[1]?.get('FRAME')).toBe('');
    });

    it('should handle empty text', () => {
      expect(parseHeaderedTable('')).toEqual({ columns: [], records: [] });
    });
  });

  describe('numericCell', () => {
    it('should read finite numbers only', () => {
      const record = new Map([
        ['A', '2.5'],
        ['B', ''],
        ['C', 'Spot ID'],
        ['D', 'Infinity'],
      ]);

      expect(numericCell(record, 'A')).toBe(2.5);
      expect(numericCell(record, 'B')).toBeUndefined();
      expect(numericCell(record, 'C')).toBeUndefined();
      expect(numericCell(record, 'D')).toBeUndefined();
      expect(numericCell(record, 'E')).toBeUndefined();
    });
  });
});

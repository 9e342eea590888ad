/**
 * Node Interpreter Tests
 *
 * Options are applied in a fixed order and every option writes as soon as
 * it is applied, so the tests compare the exact sequence of writes.
 */

import { ESC, GS, LF } from '../printer/services/escpos/commands';
import { GRAPHIC_SUBHEADER } from '../printer/services/escpos/GraphicsFrameProtocol';
import { decodeTextOptions, fontLetter } from '../printer/services/escpos/NodeInterpreter';
import { EscPosWarning, WarningCode } from '../printer/types';
import { ascii, createInterpreter, writesOf } from './helpers/encoder-fixtures';

const FEED_RESETS = [
  [ESC, 0x45, 0],
  [ESC, 0x56, 0],
  [GS, 0x42, 0],
  [ESC, 0x2d, 0],
  [ESC, 0x7b, 0],
  [GS, 0x21, 0],
];

describe('NodeInterpreter', () => {
  describe('text', () => {
    it('applies every option in order before writing the text', () => {
      const { sink, interpreter } = createInterpreter();

      const result = interpreter.execute(
        'text',
        {
          y: '2',
          x: '300',
          dh: '1',
          dw: 'true',
          font: 'font_b',
          rotate: '1',
          reverse: '1',
          ul: '1',
          em: 'true',
          align: 'center',
        },
        'A &amp; B'
      );

      expect(result).toEqual({ name: 'text', handled: true, warnings: [] });
      expect(writesOf(sink)).toEqual([
        [ESC, 0x61, 1],
        [ESC, 0x45, 1],
        [ESC, 0x2d, 1],
        [GS, 0x42, 1],
        [ESC, 0x56, 1],
        [ESC, 0x4d, 1],
        [GS, 0x21, 0x10],
        [GS, 0x21, 0x11],
        [ESC, 0x24, 0x2c, 0x01],
        [GS, 0x24, 0x02, 0x00],
        ascii('A & B'),
      ]);
    });

    it('only treats "true" and "1" as set', () => {
      const { sink, interpreter } = createInterpreter();
      interpreter.execute('text', { em: 'yes', ul: '0', reverse: 'TRUE' }, 'x');
      expect(writesOf(sink)).toEqual([ascii('x')]);
    });

    it('sets width and height from numeric options, clamping the height', () => {
      const { sink, interpreter, encoder } = createInterpreter();
      const result = interpreter.execute('text', { width: '3', height: '7' });

      expect(writesOf(sink)).toEqual([
        [GS, 0x21, 0x20],
        [GS, 0x21, 0x24],
      ]);
      expect(result.warnings.map((w) => w.code)).toEqual([WarningCode.FONT_HEIGHT_CLAMPED]);
      expect(encoder.getState()).toMatchObject({ width: 3, height: 5 });
    });

    it('reports unparsable numbers and skips them', () => {
      const { sink, interpreter } = createInterpreter();
      const result = interpreter.execute('text', { width: 'abc', x: '12px' });

      expect(sink.length).toBe(0);
      expect(result.warnings).toEqual<EscPosWarning[]>([
        {
          kind: 'parse',
          code: WarningCode.INVALID_NUMBER,
          message: "Invalid width number: 'abc'",
          option: 'width',
          value: 'abc',
        },
        {
          kind: 'parse',
          code: WarningCode.INVALID_NUMBER,
          message: "Invalid x number: '12px'",
          option: 'x',
          value: '12px',
        },
      ]);
    });

    it('falls back to font A when the font option is too short', () => {
      const { sink, interpreter } = createInterpreter();
      const result = interpreter.execute('text', { font: 'ab' });

      expect(writesOf(sink)).toEqual([[ESC, 0x4d, 0]]);
      expect(result.warnings.map((w) => w.code)).toEqual([WarningCode.INVALID_FONT]);
    });

    it('takes the face letter from the sixth character', () => {
      expect(fontLetter('font_c')).toBe('C');
      expect(fontLetter('FONT_a_extra')).toBe('A');
      expect(fontLetter('font')).toBe('');
    });

    it('decodes options without touching the encoder', () => {
      const warnings: EscPosWarning[] = [];
      const decoded = decodeTextOptions({ align: 'right', dw: '1', y: '-4' }, (w) => warnings.push(w));

      expect(decoded).toEqual({
        align: 'right',
        emphasize: false,
        underline: false,
        reverse: false,
        rotate: false,
        font: undefined,
        doubleWidth: true,
        doubleHeight: false,
        width: undefined,
        height: undefined,
        x: undefined,
        y: -4,
      });
      expect(warnings).toEqual([]);
    });
  });

  describe('feed', () => {
    it('feeds, then resets the state and sends every default again', () => {
      const { sink, interpreter, encoder } = createInterpreter();
      encoder.setEmphasize(1);
      encoder.setFontSize(2, 2);
      sink.clear();

      interpreter.execute('feed', { line: '3', unit: '40' });

      expect(writesOf(sink)).toEqual([[ESC, 0x4a, 3], [GS, 0x24, 40, 0], [LF], ...FEED_RESETS]);
      expect(encoder.getState()).toEqual({
        width: 1,
        height: 1,
        underline: 0,
        emphasize: 0,
        upsidedown: 0,
        rotate: 0,
        reverse: 0,
      });
    });

    it('starts the next text node from a clean state', () => {
      const { sink, interpreter, encoder } = createInterpreter();

      interpreter.execute('feed', {});
      interpreter.execute('text', { em: '1' }, 'hi');

      expect(writesOf(sink)).toEqual([[LF], ...FEED_RESETS, [ESC, 0x45, 1], ascii('hi')]);
      expect(encoder.getState().emphasize).toBe(1);
    });
  });

  describe('cut and pulse', () => {
    it('cuts without feeding by default', () => {
      const { sink, interpreter } = createInterpreter();
      interpreter.execute('cut');
      expect(writesOf(sink)).toEqual([[GS, 0x56, 0x41, 0x30]]);
    });

    it('feeds one line first when type is feed', () => {
      const { sink, interpreter } = createInterpreter();
      interpreter.execute('cut', { type: 'feed' });
      expect(writesOf(sink)).toEqual([
        [ESC, 0x4a, 1],
        [GS, 0x56, 0x41, 0x30],
      ]);
    });

    it('pulses the drawer', () => {
      const { sink, interpreter } = createInterpreter();
      interpreter.execute('pulse');
      expect(writesOf(sink)).toEqual([[ESC, 0x70, 2]]);
    });
  });

  describe('image', () => {
    const bitmap = Buffer.from([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);

    it('aligns, transfers the bitmap and prints it', () => {
      const { sink, interpreter } = createInterpreter();
      const result = interpreter.execute(
        'image',
        { align: 'center', width: '384', height: '24' },
        bitmap.toString('base64')
      );

      expect(result.warnings).toEqual([]);
      expect(writesOf(sink)).toEqual([
        [ESC, 0x61, 1],
        [ESC, 0x28, 0x4c, 16, 0, 0x30, 0x70, ...GRAPHIC_SUBHEADER, ...bitmap],
        [ESC, 0x28, 0x4c, 2, 0, 0x30, 0x32],
      ]);
    });

    it('reports missing dimensions and still prints', () => {
      const { sink, interpreter } = createInterpreter();
      const result = interpreter.execute('image', {}, bitmap.toString('base64'));

      expect(result.warnings.map((w) => w.message)).toEqual([
        'No width specified on image',
        'No height specified on image',
      ]);
      expect(sink.getWrites()).toHaveLength(2);
    });

    it('sends an empty bitmap when the payload is not base64', () => {
      const { sink, interpreter } = createInterpreter();
      const result = interpreter.execute('image', { width: '8', height: '8' }, '###');

      expect(result.warnings.map((w) => w.code)).toEqual([WarningCode.INVALID_BASE64]);
      expect(writesOf(sink)).toEqual([
        [ESC, 0x28, 0x4c, 6, 0, 0x30, 0x70, ...GRAPHIC_SUBHEADER],
        [ESC, 0x28, 0x4c, 2, 0, 0x30, 0x32],
      ]);
    });
  });

  describe('image transfer refused', () => {
    it('does not print the stored graphic when the bitmap does not fit a frame', () => {
      const { sink, interpreter } = createInterpreter();
      const result = interpreter.execute(
        'image',
        { align: 'center', width: '384', height: '1460' },
        Buffer.alloc(70000).toString('base64')
      );

      expect(result.warnings.map((w) => w.code)).toEqual([WarningCode.FRAME_TOO_LARGE]);
      expect(writesOf(sink)).toEqual([[ESC, 0x61, 1]]);
    });
  });

  describe('dispatch', () => {
    it('ignores unknown node names', () => {
      const { sink, interpreter } = createInterpreter();
      const result = interpreter.execute('barcode', { data: '123' }, '123');

      expect(result).toEqual({ name: 'barcode', handled: false, warnings: [] });
      expect(sink.length).toBe(0);
    });

    it('scopes warnings to the node that produced them', () => {
      const { interpreter, warnings } = createInterpreter();
      const first = interpreter.execute('text', { align: 'middle' });
      const second = interpreter.execute('text', { align: 'left' });

      expect(first.warnings.map((w) => w.code)).toEqual([WarningCode.INVALID_ALIGNMENT]);
      expect(second.warnings).toEqual([]);
      expect(warnings.size).toBe(1);
    });
  });
});

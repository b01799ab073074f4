import { describe, it, expect } from 'vitest';
import { ScpiParser } from '../scpi-parser.js';
import { DeviceError, ParseError } from '../errors.js';

describe('ScpiParser', () => {
  describe('parseNumber', () => {
    it('parses standard numeric responses', () => {
      expect(ScpiParser.parseNumber('1.234')).toEqual({ ok: true, value: 1.234 });
      expect(ScpiParser.parseNumber('-5.67')).toEqual({ ok: true, value: -5.67 });
      expect(ScpiParser.parseNumber('0')).toEqual({ ok: true, value: 0 });
      expect(ScpiParser.parseNumber('.5')).toEqual({ ok: true, value: 0.5 });
    });

    it('parses scientific notation with terminator', () => {
      expect(ScpiParser.parseNumber('+1.234500E+01\n')).toEqual({ ok: true, value: 12.345 });
      expect(ScpiParser.parseNumber('-5.67E-03')).toEqual({ ok: true, value: -5.67e-3 });
    });

    it('handles whitespace', () => {
      expect(ScpiParser.parseNumber('  1.234  ')).toEqual({ ok: true, value: 1.234 });
      expect(ScpiParser.parseNumber('\t42\r\n')).toEqual({ ok: true, value: 42 });
    });

    it('returns error for empty responses', () => {
      const result = ScpiParser.parseNumber(' \n');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ParseError);
        expect(result.error.message).toBe('empty response');
        expect(result.error.reply).toBe(' \n');
      }
    });

    it('returns error for overflow (9.9E37)', () => {
      const result = ScpiParser.parseNumber('9.9E37');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('overflow (9.9E37)');
    });

    it('returns error for non-numeric responses', () => {
      const result = ScpiParser.parseNumber('AUTO');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('non-numeric response: "AUTO"');
    });

    it('rejects trailing garbage that Number() would not catch', () => {
      expect(ScpiParser.parseNumber('1.2V').ok).toBe(false);
      expect(ScpiParser.parseNumber('0x10').ok).toBe(false);
      expect(ScpiParser.parseNumber('Infinity').ok).toBe(false);
    });
  });

  describe('parseIdentifier', () => {
    it('trims whitespace and quotes', () => {
      expect(ScpiParser.parseIdentifier(' "MLBF-1802" \n')).toEqual({ ok: true, value: 'MLBF-1802' });
      expect(ScpiParser.parseIdentifier('SN12345')).toEqual({ ok: true, value: 'SN12345' });
    });

    it('rejects empty replies', () => {
      expect(ScpiParser.parseIdentifier('""').ok).toBe(false);
    });
  });

  describe('parseErrorQueue', () => {
    it('treats code 0 as success', () => {
      expect(ScpiParser.parseErrorQueue('0,"No error"')).toEqual({ ok: true, value: undefined });
      expect(ScpiParser.parseErrorQueue('+0,"No error"\n')).toEqual({ ok: true, value: undefined });
    });

    it('returns nonzero entries as DeviceError', () => {
      const result = ScpiParser.parseErrorQueue('-113,"Undefined header"');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(DeviceError);
        if (result.error instanceof DeviceError) {
          expect(result.error.code).toBe(-113);
          expect(result.error.description).toBe('Undefined header');
          expect(result.error.message).toBe('Device error -113: Undefined header');
        }
      }
    });

    it('accepts unquoted descriptions', () => {
      const result = ScpiParser.parseErrorQueue('-222, Data out of range');
      expect(result.ok).toBe(false);
      if (!result.ok && result.error instanceof DeviceError) {
        expect(result.error.description).toBe('Data out of range');
      }
    });

    it('returns ParseError for malformed entries', () => {
      const result = ScpiParser.parseErrorQueue('garbage');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ParseError);
        expect(result.error.message).toBe('malformed error queue entry: "garbage"');
      }
    });
  });

  describe('parseBool', () => {
    it('parses 1/0 and ON/OFF', () => {
      expect(ScpiParser.parseBool('1')).toEqual({ ok: true, value: true });
      expect(ScpiParser.parseBool('0\n')).toEqual({ ok: true, value: false });
      expect(ScpiParser.parseBool('on')).toEqual({ ok: true, value: true });
      expect(ScpiParser.parseBool('OFF')).toEqual({ ok: true, value: false });
    });

    it('rejects anything else', () => {
      const result = ScpiParser.parseBool('MAYBE');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('not a boolean: "MAYBE"');
    });
  });

  describe('parseEnum', () => {
    const tokens = ['POWER', 'VIDEO', 'LINEAR'];

    it('matches exact tokens ignoring case and quotes', () => {
      expect(ScpiParser.parseEnum('video', tokens)).toEqual({ ok: true, value: 'VIDEO' });
      expect(ScpiParser.parseEnum('"LINEAR"', tokens)).toEqual({ ok: true, value: 'LINEAR' });
    });

    it('expands SCPI short forms', () => {
      expect(ScpiParser.parseEnum('POW', tokens)).toEqual({ ok: true, value: 'POWER' });
      expect(ScpiParser.parseEnum('LIN\n', tokens)).toEqual({ ok: true, value: 'LINEAR' });
    });

    it('rejects replies too short to be a short form', () => {
      const result = ScpiParser.parseEnum('PO', tokens);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('unknown value "PO", expected one of: POWER, VIDEO, LINEAR');
    });
  });

  describe('parseCsv and extractField', () => {
    it('splits comma-separated values', () => {
      expect(ScpiParser.parseCsv('1, 2 ,3')).toEqual(['1', '2', '3']);
    });

    it('picks the last field and strips its unit', () => {
      expect(ScpiParser.extractField('C1:PAVA RMS,1.23E-01V\n', -1, 'V')).toEqual({ ok: true, value: '1.23E-01' });
    });

    it('picks fields by index', () => {
      expect(ScpiParser.extractField('+5.000000E+00V,+0.000000E+00s,0', 0, 'V')).toEqual({ ok: true, value: '+5.000000E+00' });
    });

    it('fails when the field does not exist', () => {
      const result = ScpiParser.extractField('a,b', 5);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('no field 5 in "a,b"');
    });
  });

  describe('parseIdentity', () => {
    it('splits *IDN? replies', () => {
      expect(ScpiParser.parseIdentity('Hittite,HMC-T2240,000123,2.0\n')).toEqual({
        ok: true,
        value: { manufacturer: 'Hittite', model: 'HMC-T2240', serial: '000123', firmware: '2.0' },
      });
    });

    it('fills missing trailing fields with empty strings', () => {
      expect(ScpiParser.parseIdentity('Acme,Box')).toEqual({
        ok: true,
        value: { manufacturer: 'Acme', model: 'Box', serial: '', firmware: '' },
      });
    });

    it('rejects replies without a model', () => {
      const result = ScpiParser.parseIdentity('OnlyOne');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('not an identification string: "OnlyOne"');
    });
  });
});

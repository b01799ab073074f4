/**
 * SCPI Response Parser
 *
 * Utilities for parsing ASCII SCPI replies into typed values. Every parser
 * trims surrounding whitespace and line terminators first, so raw transport
 * lines can be passed straight in.
 */

import type { Identity } from '../../shared/types.js';
import { Ok, Err, type Result } from '../../shared/types.js';
import { DeviceError, ParseError } from './errors.js';

/**
 * SCPI reserves 9.9E37 for +infinity/overrange and 9.91E37 for NaN.
 * Any value at or above this magnitude is not a real reading.
 */
const SCPI_OVERFLOW_THRESHOLD = 9.9e37;

// NR1/NR2/NR3 numeric response formats
const NUMERIC = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

// <code>,"<description>" with the quotes optional on some firmware
const ERROR_ENTRY = /^([+-]?\d+)\s*,\s*(.*)$/;

function unquote(text: string): string {
  if (text.length >= 2) {
    const first = text[0];
    const last = text[text.length - 1];
    if ((first === '"' && last === '"') || (first === "'" && last === "'")) {
      return text.slice(1, -1).split(first + first).join(first);
    }
  }
  return text;
}

export const ScpiParser = {
  /**
   * Parse a numeric SCPI reply ("1.234", "+1.234500E+01", "-5").
   *
   * Fails on empty replies, anything with trailing garbage, and the SCPI
   * overflow/NaN markers.
   */
  parseNumber(reply: string): Result<number, ParseError> {
    const trimmed = reply.trim();

    if (trimmed === '') {
      return Err(new ParseError('empty response', reply));
    }

    if (!NUMERIC.test(trimmed)) {
      return Err(new ParseError(`non-numeric response: "${trimmed}"`, reply));
    }

    const value = Number(trimmed);

    if (Math.abs(value) >= SCPI_OVERFLOW_THRESHOLD) {
      return Err(new ParseError(`overflow (${trimmed})`, reply));
    }

    return Ok(value);
  },

  /**
   * Strip whitespace and one pair of surrounding quotes from a reply, e.g. an
   * identification string or a quoted enum.
   */
  parseIdentifier(reply: string): Result<string, ParseError> {
    const value = unquote(reply.trim()).trim();
    if (value === '') {
      return Err(new ParseError('empty response', reply));
    }
    return Ok(value);
  },

  /**
   * Parse an error queue entry from SYST:ERR?.
   *
   * Format: <code>,"<description>". Code 0 ("No error") is success; any
   * other code is returned as a DeviceError.
   */
  parseErrorQueue(reply: string): Result<void, DeviceError | ParseError> {
    const match = ERROR_ENTRY.exec(reply.trim());
    if (!match) {
      return Err(new ParseError(`malformed error queue entry: "${reply.trim()}"`, reply));
    }

    const code = parseInt(match[1], 10);
    if (code === 0) {
      return Ok(undefined);
    }

    return Err(new DeviceError(code, unquote(match[2].trim())));
  },

  /**
   * Parse a boolean SCPI response.
   *
   * Accepts "0"/"1" and "OFF"/"ON" (case-insensitive).
   */
  parseBool(reply: string): Result<boolean, ParseError> {
    const val = reply.trim().toUpperCase();
    if (val === '1' || val === 'ON') return Ok(true);
    if (val === '0' || val === 'OFF') return Ok(false);
    return Err(new ParseError(`not a boolean: "${reply.trim()}"`, reply));
  },

  /**
   * Match a reply against the allowed tokens, ignoring case and quotes.
   * SCPI instruments answer with the short form ("POW" for "POWER"), so a
   * token also matches when the reply is its leading abbreviation.
   */
  parseEnum(reply: string, tokens: readonly string[]): Result<string, ParseError> {
    const trimmed = unquote(reply.trim()).toUpperCase();

    const exact = tokens.find(token => token.toUpperCase() === trimmed);
    if (exact !== undefined) {
      return Ok(exact);
    }

    const abbreviated = trimmed.length >= 3
      ? tokens.find(token => token.toUpperCase().startsWith(trimmed))
      : undefined;
    if (abbreviated !== undefined) {
      return Ok(abbreviated);
    }

    return Err(new ParseError(
      `unknown value "${trimmed}", expected one of: ${tokens.join(', ')}`,
      reply
    ));
  },

  /**
   * Parse a comma-separated SCPI response into parts.
   */
  parseCsv(reply: string): string[] {
    return reply.split(',').map(s => s.trim());
  },

  /**
   * Pick one comma-separated field (negative index counts from the end) and
   * strip a trailing unit suffix. "C1:PAVA RMS,1.23E-01V" with field -1 and
   * suffix "V" yields "1.23E-01".
   */
  extractField(reply: string, field: number, suffix?: string): Result<string, ParseError> {
    const parts = this.parseCsv(reply.trim());
    const index = field < 0 ? parts.length + field : field;
    if (index < 0 || index >= parts.length) {
      return Err(new ParseError(`no field ${field} in "${reply.trim()}"`, reply));
    }

    let value = parts[index];
    if (suffix && value.toUpperCase().endsWith(suffix.toUpperCase())) {
      value = value.slice(0, value.length - suffix.length).trim();
    }
    return Ok(value);
  },

  /**
   * Parse an *IDN? reply: manufacturer,model,serial,firmware.
   * Missing trailing fields are returned as empty strings.
   */
  parseIdentity(reply: string): Result<Identity, ParseError> {
    const idn = this.parseIdentifier(reply);
    if (!idn.ok) return idn;

    const [manufacturer = '', model = '', serial = '', firmware = ''] = this.parseCsv(idn.value);
    if (manufacturer === '' || model === '') {
      return Err(new ParseError(`not an identification string: "${idn.value}"`, reply));
    }
    return Ok({ manufacturer, model, serial, firmware });
  },
};

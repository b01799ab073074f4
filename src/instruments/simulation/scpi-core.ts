/**
 * SCPI core shared by the simulators
 * Command splitting, NR3 number replies, the IEEE 488.2 common commands
 * and the SYST:ERR? error queue
 */

export interface ParsedCommand {
  /** Upper-case header without leading ':' or trailing '?' */
  header: string;
  query: boolean;
  argument: string;
}

export function parseCommand(cmd: string): ParsedCommand {
  const trimmed = cmd.trim();
  const space = trimmed.search(/\s/);
  const rawHeader = space === -1 ? trimmed : trimmed.slice(0, space);
  const argument = space === -1 ? '' : trimmed.slice(space + 1).trim();

  let header = rawHeader.toUpperCase().replace(/^:/, '');
  const query = header.endsWith('?');
  if (query) header = header.slice(0, -1);

  return { header, query, argument };
}

/** "+2.345000E+00" style reply */
export function formatNr3(value: number): string {
  const [mantissa, exponent] = value.toExponential(6).split('e');
  const exp = Number(exponent);
  const sign = value < 0 ? '' : '+';
  return `${sign}${mantissa}E${exp < 0 ? '-' : '+'}${String(Math.abs(exp)).padStart(2, '0')}`;
}

export function parseOnOff(argument: string): boolean | null {
  const value = argument.trim().toUpperCase();
  if (value === 'ON' || value === '1') return true;
  if (value === 'OFF' || value === '0') return false;
  return null;
}

export const UNDEFINED_HEADER = { code: -113, description: 'Undefined header' } as const;
export const DATA_OUT_OF_RANGE = { code: -222, description: 'Data out of range' } as const;
export const DATA_TYPE_ERROR = { code: -104, description: 'Data type error' } as const;

// Error queue depth of a typical instrument
const MAX_QUEUED_ERRORS = 10;

export interface ScpiCore {
  /** Reply for a common command, null for one without reply, undefined if not a common command */
  handleCommon(command: ParsedCommand): string | null | undefined;
  pushError(error: { code: number; description: string }): void;
  getErrors(): Array<{ code: number; description: string }>;
}

export function createScpiCore(identity: string, onReset: () => void): ScpiCore {
  const errors: Array<{ code: number; description: string }> = [];

  function pushError(error: { code: number; description: string }): void {
    if (errors.length < MAX_QUEUED_ERRORS) {
      errors.push({ ...error });
    } else {
      errors[MAX_QUEUED_ERRORS - 1] = { code: -350, description: 'Queue overflow' };
    }
  }

  function handleCommon(command: ParsedCommand): string | null | undefined {
    const { header, query } = command;

    if (header === '*IDN' && query) return identity;
    if (header === '*RST' && !query) {
      onReset();
      return null;
    }
    if (header === '*CLS' && !query) {
      errors.length = 0;
      return null;
    }
    if (header === '*OPC' && query) return '1';
    if (header === '*OPC' && !query) return null;

    if ((header === 'SYST:ERR' || header === 'SYSTEM:ERROR') && query) {
      const next = errors.shift();
      return next ? `${next.code},"${next.description}"` : '0,"No error"';
    }

    return undefined;
  }

  return {
    handleCommon,
    pushError,
    getErrors: () => errors.map(e => ({ ...e })),
  };
}

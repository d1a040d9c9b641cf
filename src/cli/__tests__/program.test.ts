/**
 * Unit tests for the command-line program wiring.
 */
import { describe, it, expect } from 'vitest';
import { DecodeError, DownloadCancelledError, TransportError } from '../../core/errors.js';
import { EXIT_CODES } from '../exit-codes.js';
import { isAffirmative } from '../lib/prompt.js';
import { createProgram, exitCodeFor } from '../program.js';

describe('createProgram', () => {
  it('registers every command', () => {
    const names = createProgram().commands.map((c) => c.name());
    expect(names).toEqual(['services', 'layers', 'schema', 'health', 'check', 'download']);
  });
});

describe('exitCodeFor', () => {
  it('maps cancellation to the user-cancelled code', () => {
    expect(exitCodeFor(new DownloadCancelledError('batch 2/4'))).toBe(EXIT_CODES.USER_CANCELLED);
  });

  it('maps everything else to the generic error code', () => {
    expect(exitCodeFor(new Error('boom'))).toBe(EXIT_CODES.ERRORS);
    expect(exitCodeFor('not an error')).toBe(EXIT_CODES.ERRORS);
  });

  it('maps transport and decode failures to the network code', () => {
    const url = 'https://gis.example.test/arcgis/rest/services/Parcels/MapServer';
    expect(exitCodeFor(new TransportError(url, 'HTTP 503', { status: 503 }))).toBe(EXIT_CODES.NETWORK_ERROR);
    expect(exitCodeFor(new DecodeError(url, 'not JSON'))).toBe(EXIT_CODES.NETWORK_ERROR);
  });
});

describe('isAffirmative', () => {
  it('accepts y and yes in any case', () => {
    expect(['y', 'Y', 'yes', ' YES '].map(isAffirmative)).toEqual([true, true, true, true]);
  });

  it('rejects anything else', () => {
    expect(['', 'n', 'no', 'yep', 'y e s'].map(isAffirmative)).toEqual([false, false, false, false, false]);
  });
});

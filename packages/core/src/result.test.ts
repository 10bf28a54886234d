import { describe, it, expect } from 'vitest';
import { err, ok, type Result } from './result.js';

function parsePort(raw: string): Result<number, string> {
  const port = Number(raw);
  return Number.isInteger(port) ? ok(port) : err(`not a port: ${raw}`);
}

describe('Result', () => {
  it('should carry the value of a success', () => {
    expect(parsePort('8080')).toEqual({ ok: true, value: 8080 });
  });

  it('should carry the error of a failure', () => {
    const result = parsePort('http');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBe('not a port: http');
    }
  });
});

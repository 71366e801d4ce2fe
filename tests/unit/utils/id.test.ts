import { describe, it, expect } from 'vitest';
import { generateRunId, isRunId, shortRunId } from '../../../src/shared/utils/id';

describe('run ids', () => {
  it('should generate unique run ids', () => {
    const a = generateRunId();
    const b = generateRunId();

    expect(a).toMatch(/^run-[0-9a-f-]{36}$/);
    expect(a).not.toBe(b);
    expect(isRunId(a)).toBe(true);
  });

  it('should reject other ids', () => {
    expect(isRunId('run-123')).toBe(false);
    expect(isRunId('session-1')).toBe(false);
  });

  it('should shorten to the first eight uuid characters', () => {
    expect(shortRunId('run-1a2b3c4d-0000-4000-8000-000000000000')).toBe('run-1a2b3c4d');
    expect(shortRunId('run-x')).toBe('run-x');
  });
});

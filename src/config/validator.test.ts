import { describe, expect, it } from 'vitest';
import { DEFAULT_LOCALIZATION } from '../orchestrator/messages.js';
import { ConfigValidationError, assertConfigValid, validateConfig } from './validator.js';
import { DEFAULT_CONFIG, parseConfig } from './index.js';
import type { Config } from './types.js';

function withProcess(process: Partial<Config['process']>): Config {
  return { ...DEFAULT_CONFIG, process: { ...DEFAULT_CONFIG.process, ...process } };
}

describe('Config Validator', () => {
  describe('validateConfig', () => {
    it('should accept the defaults', () => {
      expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [] });
    });

    it('should accept a zero grace period', () => {
      expect(validateConfig(withProcess({ kill_grace_ms: 0 })).valid).toBe(true);
    });

    it.each([-1, 1.5, Number.NaN, Number.POSITIVE_INFINITY])('should reject grace period %s', (ms) => {
      const result = validateConfig(withProcess({ kill_grace_ms: ms }));

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        {
          field: 'process.kill_grace_ms',
          value: ms,
          message: `'process.kill_grace_ms' must be a non-negative integer, got ${String(ms)}`,
        },
      ]);
    });

    it('should reject a grace period over one hour', () => {
      const result = validateConfig(withProcess({ kill_grace_ms: 3_600_001 }));

      expect(result.errors.map((e) => e.message)).toEqual([
        "'process.kill_grace_ms' exceeds reasonable maximum of 3600000 (1 hour)",
      ]);
    });

    it('should reject a signal that does not terminate', () => {
      const result = validateConfig(withProcess({ kill_signal: 'SIGSTOP' }));

      expect(result.errors).toEqual([
        {
          field: 'process.kill_signal',
          value: 'SIGSTOP',
          message: "'process.kill_signal' must terminate the process, SIGSTOP does not",
        },
      ]);
    });

    it('should reject a blank feature description', () => {
      const config = parseConfig('[features]\nenv = "  "\n');

      expect(validateConfig(config).errors.map((e) => e.field)).toEqual(['features.env']);
    });

    it('should reject blank message templates', () => {
      const config: Config = {
        ...DEFAULT_CONFIG,
        localization: { ...DEFAULT_LOCALIZATION, run: '', kill: ' ' },
      };

      expect(validateConfig(config).errors.map((e) => e.field)).toEqual(['localization.run', 'localization.kill']);
    });
  });

  describe('assertConfigValid', () => {
    it('should not throw for a valid config', () => {
      expect(() => {
        assertConfigValid(DEFAULT_CONFIG);
      }).not.toThrow();
    });

    it('should throw ConfigValidationError carrying every error', () => {
      const config: Config = {
        ...withProcess({ kill_signal: 'SIGCONT', kill_grace_ms: -5 }),
        localization: { ...DEFAULT_LOCALIZATION, run: '' },
      };

      try {
        assertConfigValid(config);
        expect.unreachable('assertConfigValid should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.errors).toHaveLength(3);
          expect(error.message).toBe(
            [
              'Configuration validation failed with 3 error(s):',
              "  - process.kill_signal: 'process.kill_signal' must terminate the process, SIGCONT does not",
              "  - process.kill_grace_ms: 'process.kill_grace_ms' must be a non-negative integer, got -5",
              "  - localization.run: Message 'localization.run' must not be blank",
            ].join('\n')
          );
        }
      }
    });
  });
});

import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  mergeConfig,
  readEnvOverrides,
} from './env.js';
import { DEFAULT_CONFIG, parseConfig } from './index.js';

describe('Environment Variable Overrides', () => {
  describe('readEnvOverrides', () => {
    it('should read ARGPANEL_DEBUG as a boolean', () => {
      const result = readEnvOverrides({ ARGPANEL_DEBUG: 'yes' });

      expect(result.overrides.logging?.debug).toBe(true);
      expect(result.appliedVars).toEqual(['ARGPANEL_DEBUG']);
    });

    it('should read process settings', () => {
      const result = readEnvOverrides({ ARGPANEL_KILL_SIGNAL: 'SIGINT', ARGPANEL_KILL_GRACE_MS: ' 250 ' });

      expect(result.overrides.process).toEqual({ kill_signal: 'SIGINT', kill_grace_ms: 250 });
    });

    it.each([
      ['int', 'SIGINT'],
      ['sigint', 'SIGINT'],
      ['HUP', 'SIGHUP'],
    ])('should normalize signal name %j to %s', (raw, expected) => {
      expect(readEnvOverrides({ ARGPANEL_KILL_SIGNAL: raw }).overrides.process?.kill_signal).toBe(expected);
    });

    it('should read feature switches', () => {
      const result = readEnvOverrides({
        ARGPANEL_FEATURES_ENV: 'on',
        ARGPANEL_FEATURES_STDIN: '0',
        ARGPANEL_FEATURES_WORKING_DIR: 'TRUE',
      });

      expect(result.overrides.features).toEqual({ env: true, stdin: false, working_dir: true });
      expect(result.appliedVars).toEqual([
        'ARGPANEL_FEATURES_ENV',
        'ARGPANEL_FEATURES_STDIN',
        'ARGPANEL_FEATURES_WORKING_DIR',
      ]);
    });

    it('should ignore unset, empty and unrelated variables', () => {
      const result = readEnvOverrides({ ARGPANEL_DEBUG: '', ARGPANEL_UNKNOWN: 'x', PATH: '/bin' });

      expect(result).toEqual({ overrides: {}, appliedVars: [], errors: [] });
    });

    describe('coercion errors', () => {
      it('should throw EnvCoercionError for a bad boolean', () => {
        expect(() => readEnvOverrides({ ARGPANEL_DEBUG: 'maybe' })).toThrow(EnvCoercionError);
      });

      it('should throw EnvCoercionError for a bad number', () => {
        expect(() => readEnvOverrides({ ARGPANEL_KILL_GRACE_MS: 'soon' })).toThrow(
          "Cannot coerce environment variable 'ARGPANEL_KILL_GRACE_MS' value 'soon' to number"
        );
      });

      it('should report a blank number as empty', () => {
        expect(() => readEnvOverrides({ ARGPANEL_KILL_GRACE_MS: '   ' })).toThrow(
          "Empty value for 'ARGPANEL_KILL_GRACE_MS'"
        );
      });

      it('should throw EnvCoercionError for an unknown signal', () => {
        expect(() => readEnvOverrides({ ARGPANEL_KILL_SIGNAL: 'SIGNOPE' })).toThrow(
          "Cannot coerce environment variable 'ARGPANEL_KILL_SIGNAL' value 'SIGNOPE' to signal name"
        );
      });

      it('should collect errors when requested', () => {
        const result = readEnvOverrides(
          { ARGPANEL_DEBUG: 'maybe', ARGPANEL_KILL_GRACE_MS: '10', ARGPANEL_FEATURES_ENV: 'perhaps' },
          { collectErrors: true }
        );

        expect(result.appliedVars).toEqual(['ARGPANEL_KILL_GRACE_MS']);
        expect(result.errors.map((error) => error.envVar)).toEqual(['ARGPANEL_DEBUG', 'ARGPANEL_FEATURES_ENV']);
        expect(result.errors[0]?.rawValue).toBe('maybe');
        expect(result.errors[0]?.expectedType).toBe('boolean');
      });
    });

    it('should accept every integer as a grace period (property-based)', () => {
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 10_000_000 }), (ms) => {
          expect(readEnvOverrides({ ARGPANEL_KILL_GRACE_MS: String(ms) }).overrides.process?.kill_grace_ms).toBe(ms);
        })
      );
    });
  });

  describe('applyEnvOverrides', () => {
    it('should let the environment win over the file', () => {
      const fileConfig = parseConfig('[process]\nkill_grace_ms = 2000\n[logging]\ndebug = false\n');

      const config = applyEnvOverrides(fileConfig, { ARGPANEL_KILL_GRACE_MS: '10', ARGPANEL_DEBUG: 'true' });

      expect(config.process).toEqual({ kill_signal: 'SIGTERM', kill_grace_ms: 10 });
      expect(config.logging.debug).toBe(true);
    });

    it('should keep a configured feature description when toggled from the environment', () => {
      const fileConfig = parseConfig('[features]\nstdin = "Piped to the tool"\n');

      const disabled = applyEnvOverrides(fileConfig, { ARGPANEL_FEATURES_STDIN: 'false' });

      expect(disabled.features.stdin).toEqual({ enabled: false, description: 'Piped to the tool' });
    });

    it('should return an equal config for an empty environment', () => {
      expect(applyEnvOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
    });
  });

  describe('mergeConfig', () => {
    it('should leave the localization table alone', () => {
      const merged = mergeConfig(DEFAULT_CONFIG, { logging: { debug: true } });

      expect(merged.localization).toBe(DEFAULT_CONFIG.localization);
    });
  });

  describe('getEnvVarDocumentation', () => {
    it('should document every supported variable', () => {
      const docs = getEnvVarDocumentation();

      expect(Object.keys(docs)).toEqual([
        'ARGPANEL_DEBUG',
        'ARGPANEL_KILL_SIGNAL',
        'ARGPANEL_KILL_GRACE_MS',
        'ARGPANEL_FEATURES_ENV',
        'ARGPANEL_FEATURES_STDIN',
        'ARGPANEL_FEATURES_WORKING_DIR',
      ]);
      expect(docs.ARGPANEL_KILL_GRACE_MS?.type).toBe('number');
    });
  });
});

import { readFileSync } from 'fs';
import { ConfigurationError, errorMessage } from '../utils/errors';
import { HazardResult, HazardRule } from '../types/guide.types';

export const EMERGENCY_ADVISORY =
  'Do not use this app for emergencies. Seek immediate medical attention.';

interface CompiledHazardRule {
  readonly pattern: string;
  readonly regex: RegExp;
  readonly message: string;
}

const isHazardRule = (value: unknown): value is HazardRule =>
  typeof value === 'object' &&
  value !== null &&
  'pattern' in value &&
  'message' in value &&
  typeof value.pattern === 'string' &&
  typeof value.message === 'string' &&
  value.pattern.length > 0 &&
  value.message.length > 0;

export function parseHazardRules(raw: unknown): HazardRule[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new ConfigurationError('Hazard rules must be a non-empty array');
  }

  return raw.map((entry, index) => {
    if (!isHazardRule(entry)) {
      throw new ConfigurationError(`Hazard rule #${index + 1} needs a "pattern" and a "message"`);
    }
    return { pattern: entry.pattern, message: entry.message };
  });
}

export function loadHazardRules(filePath: string): HazardRule[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to load hazard rules from ${filePath}: ${errorMessage(error)}`);
  }
  return parseHazardRules(raw);
}

/**
 * Screens symptom text for emergency phrases. Rules are tried in the order they
 * were declared and the first match wins; nothing is aggregated or ranked.
 */
export class HazardScanner {
  private readonly rules: ReadonlyArray<CompiledHazardRule>;

  constructor(rules: HazardRule[]) {
    this.rules = Object.freeze(
      parseHazardRules(rules).map((rule) => {
        let regex: RegExp;
        try {
          regex = new RegExp(rule.pattern, 'i');
        } catch (error) {
          throw new ConfigurationError(`Invalid hazard pattern ${rule.pattern}: ${errorMessage(error)}`);
        }
        return Object.freeze({ pattern: rule.pattern, regex, message: rule.message });
      })
    );
  }

  static fromFile(filePath: string): HazardScanner {
    return new HazardScanner(loadHazardRules(filePath));
  }

  get size(): number {
    return this.rules.length;
  }

  scan(text: string): HazardResult {
    if (!text) {
      return { detected: false };
    }

    const lowered = text.toLowerCase();
    for (const rule of this.rules) {
      if (rule.regex.test(lowered)) {
        return {
          detected: true,
          message: rule.message,
          advisory: EMERGENCY_ADVISORY,
          pattern: rule.pattern,
        };
      }
    }

    return { detected: false };
  }
}

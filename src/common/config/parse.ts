// src/common/config/parse.ts
import YAML from 'yaml';

/**
 * Parse configuration text based on file extension.
 * - JSON when path ends with ".json"
 * - YAML otherwise (".yml", ".yaml", anything else)
 */
export const parseText = (p: string, text: string): unknown =>
  p.toLowerCase().endsWith('.json')
    ? (JSON.parse(text) as unknown)
    : (YAML.parse(text) as unknown);

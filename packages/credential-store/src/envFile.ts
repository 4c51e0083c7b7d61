/**
 * Line-level `.env` editing. Reads go through dotenv; writes touch only the
 * lines of the keys being set and leave every other byte alone.
 */
import {parse as dotenvParse} from 'dotenv';

export const parseEnvContent = (content: string): Record<string, string> => dotenvParse(content);

/**
 * Quotes a value so it survives dotenv.parse. Single quotes are literal;
 * double quotes are used only when the value itself holds a single quote.
 */
export const quoteEnvValue = (value: string) => {
  if (value.length === 0) {
    return '';
  }
  const needsQuoting = /[#"'\\\n\r\s]/u.test(value);
  if (!needsQuoting) {
    return value;
  }
  if (!value.includes("'")) {
    return `'${value}'`;
  }
  return `"${value.replace(/\n/gu, '\\n').replace(/\r/gu, '\\r')}"`;
};

const ASSIGNMENT_PATTERN = /^(\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_.-]*)\s*=\s*)/u;

export type EnvMerge = {
  content: string;
  changed: boolean;
  updatedKeys: string[];
};

/**
 * Sets `updates` in `content`: the first line of a key is rewritten in place,
 * later lines for the same key are dropped and absent keys are appended.
 */
export const mergeEnvContent = (content: string, updates: ReadonlyArray<readonly [string, string]>): EnvMerge => {
  const wanted = new Map(updates);
  const seen = new Set<string>();
  const updatedKeys = new Set<string>();
  const hasTrailingNewline = content.endsWith('\n');
  const body = hasTrailingNewline ? content.slice(0, -1) : content;
  const lines = content.length === 0 ? [] : body.split('\n');
  const output: string[] = [];

  for (const line of lines) {
    const match = ASSIGNMENT_PATTERN.exec(line);
    const prefix = match?.[1];
    const key = match?.[2];
    if (prefix === undefined || key === undefined || !wanted.has(key)) {
      output.push(line);
      continue;
    }

    if (seen.has(key)) {
      updatedKeys.add(key);
      continue;
    }
    seen.add(key);

    const lineEnding = line.endsWith('\r') ? '\r' : '';
    const replacement = `${prefix}${quoteEnvValue(wanted.get(key) ?? '')}${lineEnding}`;
    if (replacement !== line) {
      updatedKeys.add(key);
    }
    output.push(replacement);
  }

  for (const [key, value] of updates) {
    if (!seen.has(key)) {
      output.push(`${key}=${quoteEnvValue(value)}`);
      updatedKeys.add(key);
    }
  }

  if (updatedKeys.size === 0) {
    return {content, changed: false, updatedKeys: []};
  }
  return {
    content: output.length === 0 ? '' : `${output.join('\n')}\n`,
    changed: true,
    updatedKeys: updates.map(([key]) => key).filter(key => updatedKeys.has(key))
  };
};

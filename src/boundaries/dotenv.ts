/**
 * Parses dotenv-style `KEY=value` lines. Quotes around a value are removed;
 * an unquoted value ends at ` #`.
 */
export function parseDotEnv(content: string): Record<string, string> {
  const vars: Record<string, string> = {};
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    const match = line.match(/^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/);
    if (!match || !match[1] || match[2] === undefined) continue;
    let value = match[2];
    if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    } else {
      const hashAt = value.indexOf(' #');
      if (hashAt !== -1) value = value.slice(0, hashAt).trim();
    }
    vars[match[1]] = value;
  }
  return vars;
}

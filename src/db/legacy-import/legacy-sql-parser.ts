/** A cleaned value from a SQL Server INSERT. Bits stay numeric; the mapper knows which columns are flags. */
export type LegacyValue = string | number | Date | null;

export type LegacyRow = Record<string, LegacyValue>;

const INSERT_PATTERN = /^\s*INSERT\s+\[dbo\]\.\[Amendment\]/i;
const COLUMNS_PATTERN = /^\s*INSERT\s+\[dbo\]\.\[Amendment\]\s*\(([^)]*)\)/i;
const VALUES_PATTERN = /\bVALUES\s*\(([\s\S]*)\)\s*;?\s*$/i;
const CAST_PATTERN = /^CAST\(\s*N?'([^']*)'\s+AS\s+(DateTime2?|Date)\s*\)$/i;

/**
 * SQL Server "Generate Scripts" output is UTF-16 LE with a BOM by default; plain
 * UTF-8 dumps are accepted too.
 */
export const decodeDump = (buffer: Buffer): string => {
  if (buffer.length >= 2 && buffer[0] === 0xff && buffer[1] === 0xfe) {
    return buffer.subarray(2).toString("utf16le");
  }
  if (buffer.length >= 2 && buffer[0] === 0xfe && buffer[1] === 0xff) {
    return Buffer.from(buffer.subarray(2)).swap16().toString("utf16le");
  }
  if (buffer.length >= 3 && buffer[0] === 0xef && buffer[1] === 0xbb && buffer[2] === 0xbf) {
    return buffer.subarray(3).toString("utf8");
  }

  // No BOM: UTF-16 LE text has a zero high byte on most ASCII characters
  const sample = buffer.subarray(0, Math.min(buffer.length, 512));
  let zeroOdd = 0;
  for (let i = 1; i < sample.length; i += 2) {
    if (sample[i] === 0) zeroOdd++;
  }
  if (sample.length >= 4 && zeroOdd > sample.length / 4) {
    return buffer.subarray(0, buffer.length - (buffer.length % 2)).toString("utf16le");
  }
  return buffer.toString("utf8");
};

/** One INSERT per line, as the export writes them. */
export const extractAmendmentInserts = (content: string): string[] =>
  content
    .split(/\r?\n/)
    .filter((line) => INSERT_PATTERN.test(line))
    .map((line) => line.trim());

export const parseInsertColumns = (statement: string): string[] | null => {
  const match = COLUMNS_PATTERN.exec(statement);
  if (!match) return null;
  return match[1].split(",").map((column) => column.trim().replace(/^\[|\]$/g, ""));
};

/**
 * Splits the VALUES list on top-level commas. Commas inside quoted strings
 * (with '' as an escaped quote) and inside CAST(...) are kept.
 */
export const splitInsertValues = (statement: string): string[] | null => {
  const match = VALUES_PATTERN.exec(statement);
  if (!match) return null;

  const body = match[1];
  const values: string[] = [];
  let current = "";
  let inString = false;
  let depth = 0;

  for (let i = 0; i < body.length; i++) {
    const char = body[i];

    if (inString) {
      current += char;
      if (char === "'") {
        if (body[i + 1] === "'") {
          current += "'";
          i++;
        } else {
          inString = false;
        }
      }
      continue;
    }

    if (char === "'") {
      inString = true;
      current += char;
    } else if (char === "(") {
      depth++;
      current += char;
    } else if (char === ")") {
      depth--;
      current += char;
    } else if (char === "," && depth === 0) {
      values.push(current.trim());
      current = "";
    } else {
      current += char;
    }
  }

  if (inString || depth !== 0) return null;
  if (current.trim().length > 0 || values.length > 0) values.push(current.trim());
  return values;
};

const parseLegacyDate = (text: string): Date | null => {
  const match = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,7}))?)?)?$/.exec(text.trim());
  if (!match) return null;
  const [, year, month, day, hour = "0", minute = "0", second = "0", fraction = "0"] = match;
  const date = new Date(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second),
    Math.round(Number(`0.${fraction}`) * 1000)
  );
  return Number.isNaN(date.getTime()) ? null : date;
};

const unquote = (value: string, prefixLength: number) => value.slice(prefixLength, -1).replace(/''/g, "'");

export const cleanSqlValue = (raw: string): LegacyValue => {
  const value = raw.trim();
  if (value.length === 0 || value.toUpperCase() === "NULL") return null;

  const cast = CAST_PATTERN.exec(value);
  if (cast) return parseLegacyDate(cast[1]);

  if (value.length >= 3 && value.startsWith("N'") && value.endsWith("'")) return unquote(value, 2);
  if (value.length >= 2 && value.startsWith("'") && value.endsWith("'")) return unquote(value, 1);

  if (/^-?\d+$/.test(value)) return Number.parseInt(value, 10);
  if (/^-?\d*\.\d+$/.test(value)) return Number.parseFloat(value);
  return value;
};

/** Column name -> cleaned value, or null when the column count does not line up. */
export const parseInsertRow = (statement: string, columns: string[]): LegacyRow | null => {
  const values = splitInsertValues(statement);
  if (!values || values.length !== columns.length) return null;
  const row: LegacyRow = {};
  columns.forEach((column, index) => {
    row[column] = cleanSqlValue(values[index]);
  });
  return row;
};

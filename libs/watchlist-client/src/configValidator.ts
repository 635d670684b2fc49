import { readFile } from 'node:fs/promises';
import { err, ok, ResultAsync, type Result } from 'neverthrow';
import { ImproperFileFormatError, WatchlistIoError } from './types';

const HEADER_PATTERN = /^sourceId,RTSsymbol$/;

// Source ID of 3 or 4 digits, then a symbol in the feed's instrument symbology.
// The class admits a literal backslash.
const ROW_PATTERN = /^[0-9]{3,4},[A-Z0-9\\+;()!*\-.:\/$@&_%#]+$/;

export function validateHeader(header: string): Result<void, ImproperFileFormatError> {
  if (!HEADER_PATTERN.test(header)) {
    return err(new ImproperFileFormatError('Improperly formatted header'));
  }
  return ok(undefined);
}

export function validateRow(row: string, index: number): Result<void, ImproperFileFormatError> {
  if (!ROW_PATTERN.test(row)) {
    return err(new ImproperFileFormatError(`Line ${index} - Improperly formatted`, index));
  }
  return ok(undefined);
}

/**
 * Validate the text of a watchlist configuration file. Record 0 is the
 * header; every later record is checked as a row under its record index.
 * Stops at the first failure.
 */
export function validateConfigContent(content: string): Result<void, ImproperFileFormatError> {
  const records = splitRecords(content);
  if (records.length === 0) {
    return validateHeader('');
  }

  for (const [index, fields] of records.entries()) {
    const joined = fields.join(',');
    const result = index === 0 ? validateHeader(joined) : validateRow(joined, index);
    if (result.isErr()) {
      return result;
    }
  }
  return ok(undefined);
}

export function validateConfigFile(
  path: string,
): ResultAsync<void, ImproperFileFormatError | WatchlistIoError> {
  return ResultAsync.fromPromise(
    readFile(path, 'utf8'),
    (error) =>
      new WatchlistIoError(
        `Unable to read ${path}: ${error instanceof Error ? error.message : String(error)}`,
        path,
      ),
  ).andThen(validateConfigContent);
}

function splitRecords(content: string): string[][] {
  const lines = content.replace(/^\uFEFF/, '').split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.map(parseRecord);
}

// Fields keep their surrounding whitespace: "207, F:FDAX" must not validate.
// A quote opens a quoted section only as the first character of a field;
// anywhere else it is literal, so `F:FDAX"Z"20` fails the row pattern.
function parseRecord(line: string): string[] {
  if (line.length === 0) {
    return [];
  }

  const fields: string[] = [];
  let field = '';
  let quoted = false;
  let atFieldStart = true;
  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (quoted) {
      if (char !== '"') {
        field += char;
      } else if (line[i + 1] === '"') {
        field += '"';
        i += 1;
      } else {
        quoted = false;
      }
    } else if (char === ',') {
      fields.push(field);
      field = '';
      atFieldStart = true;
      continue;
    } else if (char === '"' && atFieldStart) {
      quoted = true;
    } else {
      field += char;
    }
    atFieldStart = false;
  }
  fields.push(field);
  return fields;
}

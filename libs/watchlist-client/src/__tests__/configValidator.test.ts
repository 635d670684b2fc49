import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import {
  validateConfigContent,
  validateConfigFile,
  validateHeader,
  validateRow,
} from '../configValidator';
import { ImproperFileFormatError } from '../types';

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe('validateHeader', () => {
  it('accepts the exact header', () => {
    expect(validateHeader('sourceId,RTSsymbol').isOk()).toBe(true);
  });

  it('rejects a header with different casing', () => {
    const error = validateHeader('SourceID,RTSSymbol')._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(ImproperFileFormatError);
    expect(error.message).toBe('Improperly formatted header');
    expect(error.line).toBeUndefined();
  });
});

describe('validateRow', () => {
  it('accepts a source ID followed by a symbol containing a backslash', () => {
    expect(validateRow('207,F:FDAX\\Z20', 1).isOk()).toBe(true);
  });

  it.each([
    ['207,F:FDAX\\Z20'],
    ['1001,ES\\Z20'],
    ['596,+;()!*-.:/$@&_%#'],
  ])('accepts %s', (row) => {
    expect(validateRow(row, 3).isOk()).toBe(true);
  });

  it('rejects a space after the comma', () => {
    const error = validateRow('207, F:FDAX\\Z20', 1)._unsafeUnwrapErr();

    expect(error.message).toBe('Line 1 - Improperly formatted');
    expect(error.line).toBe(1);
  });

  it.each([
    ['207,F:FDAX??Z20'],
    ['20,F:FDAX'],
    ['12345,F:FDAX'],
    ['207,aapl'],
    ['207,'],
    ['ABC,F:FDAX'],
  ])('rejects %s', (row) => {
    expect(validateRow(row, 4)._unsafeUnwrapErr().message).toBe('Line 4 - Improperly formatted');
  });
});

describe('validateConfigContent', () => {
  it('accepts quoted fields', () => {
    expect(validateConfigContent('"sourceId","RTSsymbol"\n"207","F:FDAX\\Z20"\n').isOk()).toBe(
      true,
    );
  });

  it('keeps a quote inside a field as a literal character', () => {
    const error = validateConfigContent('sourceId,RTSsymbol\n207,F:FDAX"Z"20\n')._unsafeUnwrapErr();

    expect(error.message).toBe('Line 1 - Improperly formatted');
    expect(error.line).toBe(1);
  });

  it('accepts CRLF line endings and a leading byte order mark', () => {
    expect(validateConfigContent('\uFEFFsourceId,RTSsymbol\r\n207,ES\\Z20\r\n').isOk()).toBe(true);
  });

  it('reports a blank line in the middle of the file', () => {
    const error = validateConfigContent('sourceId,RTSsymbol\n207,ES\n\n673,CL\n')._unsafeUnwrapErr();

    expect(error.message).toBe('Line 2 - Improperly formatted');
    expect(error.line).toBe(2);
  });

  it('stops at the first failing row', () => {
    const error = validateConfigContent('sourceId,RTSsymbol\n207,es\n67,CL\n')._unsafeUnwrapErr();

    expect(error.message).toBe('Line 1 - Improperly formatted');
  });

  it('rejects an empty file as a header failure', () => {
    expect(validateConfigContent('')._unsafeUnwrapErr().message).toBe(
      'Improperly formatted header',
    );
  });
});

describe('validateConfigFile', () => {
  it('accepts a correctly formatted file', async () => {
    const result = await validateConfigFile(fixture('watchlist_config_valid.csv'));

    expect(result.isOk()).toBe(true);
  });

  it('rejects a file with an incorrect header', async () => {
    const result = await validateConfigFile(fixture('watchlist_config_wrong_header.csv'));

    expect(result._unsafeUnwrapErr().message).toBe('Improperly formatted header');
  });

  it('reports the first incorrect row with its line number', async () => {
    const result = await validateConfigFile(fixture('watchlist_config_wrong_rows.csv'));

    const error = result._unsafeUnwrapErr();
    expect(error.kind).toBe('format');
    expect(error.message).toBe('Line 6 - Improperly formatted');
  });

  it('reports a missing file as an IO failure', async () => {
    const missing = fixture('does_not_exist.csv');
    const result = await validateConfigFile(missing);

    const error = result._unsafeUnwrapErr();
    expect(error.kind).toBe('io');
    expect(error.message.startsWith(`Unable to read ${missing}:`)).toBe(true);
  });
});

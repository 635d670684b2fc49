import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  inferRetrievedTimestamp,
  packageRetrievedConfig,
  writeRetrievedConfig,
} from '../retrieval';

const ENDPOINT = 'https://watchlist.test/v1/configurations/watchlists';
const CONFIG_BODY = 'sourceId,RTSsymbol\n207,F:FDAX\\Z20\n673,F:FESX\\Z20\n';

describe('inferRetrievedTimestamp', () => {
  it('uses the Date header when the request had no query string', () => {
    const headers = new Headers({ Date: 'Fri, 20 Nov 2020 11:47:40 GMT' });

    expect(inferRetrievedTimestamp(ENDPOINT, headers)._unsafeUnwrap()).toBe('20201120T114740Z');
  });

  it('uses the dateTime value when the request had a query string', () => {
    const headers = new Headers({ Date: 'Fri, 20 Nov 2020 11:47:40 GMT' });

    const timestamp = inferRetrievedTimestamp(
      `${ENDPOINT}?dateTime=2020-11-18T12:30:52Z`,
      headers,
    );

    expect(timestamp._unsafeUnwrap()).toBe('20201118T123052Z');
  });

  it('decodes a percent-encoded dateTime value', () => {
    const timestamp = inferRetrievedTimestamp(
      `${ENDPOINT}?dateTime=2020-11-18T12%3A30%3A52Z`,
      new Headers(),
    );

    expect(timestamp._unsafeUnwrap()).toBe('20201118T123052Z');
  });

  it('fails when the Date header is missing', () => {
    const timestamp = inferRetrievedTimestamp(ENDPOINT, new Headers());

    expect(timestamp._unsafeUnwrapErr().message).toBe('Response is missing a Date header');
  });

  it('fails when the query string carries no value', () => {
    const timestamp = inferRetrievedTimestamp(`${ENDPOINT}?dateTime=`, new Headers());

    expect(timestamp._unsafeUnwrapErr().message).toBe(
      'Query string carries no timestamp: "dateTime="',
    );
  });

  it('fails on a request URL that cannot be parsed', () => {
    const timestamp = inferRetrievedTimestamp('not a url', new Headers());

    expect(timestamp._unsafeUnwrapErr().message).toBe('Request URL is not a valid URL');
  });
});

describe('packageRetrievedConfig', () => {
  it('packages the timestamp and the raw body of an active configuration', async () => {
    const response = new Response(CONFIG_BODY, {
      status: 200,
      headers: { Date: 'Fri, 20 Nov 2020 11:47:40 GMT', 'Content-Type': 'text/csv' },
    });

    const packaged = (await packageRetrievedConfig(ENDPOINT, response))._unsafeUnwrap();

    expect(packaged.timestamp).toBe('20201120T114740Z');
    expect(new TextDecoder().decode(packaged.body)).toBe(CONFIG_BODY);
  });

  it('packages a deactivated configuration under the requested timestamp', async () => {
    const response = new Response(CONFIG_BODY, {
      status: 200,
      headers: { Date: 'Fri, 20 Nov 2020 11:47:40 GMT' },
    });

    const packaged = await packageRetrievedConfig(
      `${ENDPOINT}?dateTime=2020-11-18T12:30:52Z`,
      response,
    );

    expect(packaged._unsafeUnwrap().timestamp).toBe('20201118T123052Z');
  });
});

describe('writeRetrievedConfig', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), 'watchlist-retrieval-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('writes the body unmodified under a timestamped name, creating the directory', async () => {
    const target = path.join(directory, 'configs');
    const config = {
      timestamp: '20201120T114740Z',
      body: new TextEncoder().encode(CONFIG_BODY),
    };

    const written = (await writeRetrievedConfig(config, target))._unsafeUnwrap();

    expect(written).toBe(path.join(target, 'watchlist_config@20201120T114740Z.csv'));
    expect(await readFile(written, 'utf8')).toBe(CONFIG_BODY);
  });

  it('reports a target that cannot be created', async () => {
    const blocker = path.join(directory, 'blocker');
    await writeFile(blocker, 'not a directory');
    const config = { timestamp: '20201120T114740Z', body: new Uint8Array([1, 2, 3]) };

    const written = await writeRetrievedConfig(config, path.join(blocker, 'nested'));

    const error = written._unsafeUnwrapErr();
    expect(error.kind).toBe('io');
    expect(error.path).toBe(
      path.join(blocker, 'nested', 'watchlist_config@20201120T114740Z.csv'),
    );
  });
});

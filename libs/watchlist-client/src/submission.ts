import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { err, errAsync, ok, Result, ResultAsync } from 'neverthrow';
import { z } from 'zod';
import { COMPACT_UTC_FORMAT, convertUtcTimestamp } from './timestamps';
import { WatchlistIoError, WatchlistParseError } from './types';

const sourceIds = z.array(z.string());
const count = z.number().int().nonnegative();

/**
 * Actions the API performed for a submitted configuration. Keys the API adds
 * beyond these nine are kept so the mapping can be written back verbatim.
 */
export const WatchlistActionSummarySchema = z
  .object({
    nbCreated: count,
    nbUpdated: count,
    nbFailed: count,
    nbDeactivated: count,
    created: sourceIds,
    updated: sourceIds,
    failed: sourceIds,
    deactivated: sourceIds,
  })
  .passthrough();

export type WatchlistActionSummary = z.infer<typeof WatchlistActionSummarySchema>;

export interface RequestSummary {
  /** Raw `Date` header of the submission response. */
  readonly submissionTime: string;
  readonly summary: WatchlistActionSummary;
}

const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  (error) => new WatchlistParseError(`Response body is not valid JSON: ${errorMessage(error)}`),
);

export function parseActionSummary(body: unknown): Result<WatchlistActionSummary, WatchlistParseError> {
  const parsed = WatchlistActionSummarySchema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return err(new WatchlistParseError(`Unexpected request summary shape: ${issues}`));
  }
  // Keys stay in the order the API sent them.
  if (typeof body === 'object' && body !== null) {
    return ok({ ...body, ...parsed.data });
  }
  return ok(parsed.data);
}

export function mapSubmissionResponse(
  response: Response,
): ResultAsync<RequestSummary, WatchlistParseError> {
  const submissionTime = response.headers.get('date');
  if (submissionTime === null) {
    return errAsync(new WatchlistParseError('Response is missing a Date header'));
  }

  return ResultAsync.fromPromise(
    response.text(),
    (error) => new WatchlistParseError(`Unable to read response body: ${errorMessage(error)}`),
  )
    .andThen(parseJson)
    .andThen(parseActionSummary)
    .map((summary): RequestSummary => ({ submissionTime, summary }));
}

/** Human-readable report of a submission. */
export function stringifyRequestSummary(requestSummary: RequestSummary): string {
  const { submissionTime, summary } = requestSummary;
  let report =
    `${submissionTime}\n\n` +
    'Actions performed as a result of the request:\n' +
    `  - ${summary.nbCreated} new sources have been activated\n` +
    `  - ${summary.nbUpdated} existing sources have been updated\n` +
    `  - ${summary.nbFailed} sources have failed\n` +
    `  - ${summary.nbDeactivated} existing sources have been deactivated\n\n`;

  if (summary.nbCreated !== 0) {
    report += `The following sources have been activated: ${summary.created.join(', ')}\n`;
  }
  if (summary.nbUpdated !== 0) {
    report += `The following sources have been updated: ${summary.updated.join(', ')}\n`;
  }
  if (summary.nbFailed !== 0) {
    report += `The following sources have failed: ${summary.failed.join(', ')}\n`;
  }
  if (summary.nbDeactivated !== 0) {
    report += `The following sources have been deactivated: ${summary.deactivated.join(', ')}\n`;
  }
  return report;
}

/**
 * Write the summary mapping as JSON to
 * `<directory>/request_summary_<submission time>.json`. Returns the file path.
 */
export function writeRequestSummaryJson(
  requestSummary: RequestSummary,
  directory: string,
): ResultAsync<string, WatchlistParseError | WatchlistIoError> {
  const fileName = convertUtcTimestamp(requestSummary.submissionTime, COMPACT_UTC_FORMAT).map(
    (timestamp) => path.join(directory, `request_summary_${timestamp}.json`),
  );
  if (fileName.isErr()) {
    return errAsync(fileName.error);
  }

  const filePath = fileName.value;
  const contents = JSON.stringify(requestSummary.summary, null, 2);
  return ResultAsync.fromPromise(
    mkdir(directory, { recursive: true }).then(() => writeFile(filePath, contents, 'utf8')),
    (error) => new WatchlistIoError(`Unable to write ${filePath}: ${errorMessage(error)}`, filePath),
  ).map(() => filePath);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

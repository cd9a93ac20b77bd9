import {
  CloudWatchLogsClient,
  CreateLogStreamCommand,
  PutLogEventsCommand,
  type CreateLogStreamCommandInput,
  type CreateLogStreamCommandOutput,
  type PutLogEventsCommandInput,
  type PutLogEventsCommandOutput,
} from '@aws-sdk/client-cloudwatch-logs';
import { AuditError, AuthError, ThrottlingError, TransportError, errorName } from '../core/errors.js';
import type { LogEvent, SinkCoordinates } from '../core/types.js';
import { getLogger } from '../utils/logging.js';

// PutLogEvents counts each event as its UTF-8 size plus 26 bytes, 256 KiB max
export const MAX_EVENT_BYTES = 262_144 - 26;

export interface LogSink {
  readonly name: string;
  put(coords: SinkCoordinates, events: LogEvent[]): Promise<void>;
}

/** The two CloudWatch Logs operations used here; a seam for in-process fakes. */
export interface CloudWatchLogsApi {
  putLogEvents(input: PutLogEventsCommandInput): Promise<PutLogEventsCommandOutput>;
  createLogStream(input: CreateLogStreamCommandInput): Promise<CreateLogStreamCommandOutput>;
}

export function cloudWatchLogsApi(client: CloudWatchLogsClient): CloudWatchLogsApi {
  return {
    putLogEvents: (input) => client.send(new PutLogEventsCommand(input)),
    createLogStream: (input) => client.send(new CreateLogStreamCommand(input)),
  };
}

const THROTTLE_ERRORS = new Set([
  'ThrottlingException',
  'TooManyRequestsException',
  'RequestLimitExceeded',
  'LimitExceededException',
  'ServiceUnavailableException',
]);

const AUTH_ERRORS = new Set([
  'AccessDeniedException',
  'UnrecognizedClientException',
  'InvalidSignatureException',
  'ExpiredToken',
  'ExpiredTokenException',
  'InvalidClientTokenId',
  'MissingAuthenticationToken',
  'CredentialsProviderError',
]);

/** Maps an SDK failure onto the retry classes the delivery engine understands. */
export function classifySinkError(err: unknown): AuditError {
  if (err instanceof AuditError) return err;
  const name = errorName(err);
  if (THROTTLE_ERRORS.has(name)) return new ThrottlingError(`Log sink throttled: ${name}`, err);
  if (AUTH_ERRORS.has(name)) return new AuthError(`Log sink rejected credentials: ${name}`, err);
  return new TransportError(`Log sink call failed: ${name}`, err);
}

export interface CloudWatchLogSinkOptions {
  region: string;
  timeoutMs: number;
  api?: CloudWatchLogsApi;
}

export class CloudWatchLogSink implements LogSink {
  readonly name = 'cloudwatch-logs';
  private readonly api: CloudWatchLogsApi;

  constructor(opts: CloudWatchLogSinkOptions) {
    this.api =
      opts.api ??
      cloudWatchLogsApi(
        new CloudWatchLogsClient({
          region: opts.region,
          // retries belong to the delivery state machine
          maxAttempts: 1,
          requestHandler: { requestTimeout: opts.timeoutMs, connectionTimeout: opts.timeoutMs },
        }),
      );
  }

  async put(coords: SinkCoordinates, events: LogEvent[]): Promise<void> {
    const input: PutLogEventsCommandInput = {
      logGroupName: coords.logGroup,
      logStreamName: coords.logStream,
      logEvents: events.map((e) => ({ timestamp: e.timestampMs, message: e.message })),
    };
    let out: PutLogEventsCommandOutput;
    try {
      out = await this.api.putLogEvents(input);
    } catch (err) {
      if (errorName(err) !== 'ResourceNotFoundException') throw classifySinkError(err);
      await this.createStream(coords);
      try {
        out = await this.api.putLogEvents(input);
      } catch (retryErr) {
        throw classifySinkError(retryErr);
      }
    }
    const rejected = out.rejectedLogEventsInfo;
    if (rejected) {
      throw new TransportError(
        `Log sink rejected events (tooNew=${rejected.tooNewLogEventStartIndex ?? '-'}, tooOld=${
          rejected.tooOldLogEventEndIndex ?? '-'
        }, expired=${rejected.expiredLogEventEndIndex ?? '-'})`,
      );
    }
  }

  private async createStream(coords: SinkCoordinates): Promise<void> {
    try {
      await this.api.createLogStream({ logGroupName: coords.logGroup, logStreamName: coords.logStream });
      getLogger().info({ logGroup: coords.logGroup, logStream: coords.logStream }, 'log-stream-created');
    } catch (err) {
      if (errorName(err) === 'ResourceAlreadyExistsException') return;
      throw classifySinkError(err);
    }
  }
}

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';

import { getTeslafiConfig, type TeslafiConfig } from '../config/teslafiConfig';
import { parseFeedBody, type Snapshot } from '../models/snapshot';
import { TeslafiApiError } from '../utils/errors';
import { logger } from '../utils/logger';

const MAX_DETAIL_LENGTH = 512;

/** Anything that can hand out feed snapshots; the reconciler only needs this much. */
export interface SnapshotSource {
  fetchSnapshot(command?: string): Promise<Snapshot>;
}

const truncate = (value: string): string =>
  value.length > MAX_DETAIL_LENGTH ? `${value.slice(0, MAX_DETAIL_LENGTH)}…` : value;

const stringifyBody = (data: unknown): string => {
  if (typeof data === 'string') {
    return data;
  }

  if (data === undefined || data === null) {
    return '';
  }

  return JSON.stringify(data);
};

const decodeBody = (data: unknown): { ok: true; value: unknown } | { ok: false } => {
  if (typeof data !== 'string') {
    return { ok: true, value: data };
  }

  try {
    return { ok: true, value: JSON.parse(data) };
  } catch {
    return { ok: false };
  }
};

const describeTransportFailure = (error: unknown): string => {
  if (axios.isAxiosError(error)) {
    return [error.code, error.message].filter(Boolean).join(': ');
  }

  return error instanceof Error ? error.message : String(error);
};

export class TeslafiService implements SnapshotSource {
  private readonly config: TeslafiConfig;

  private readonly http: AxiosInstance;

  constructor(config?: TeslafiConfig, http?: AxiosInstance) {
    this.config = config ?? getTeslafiConfig();
    this.http = http ?? axios.create({ timeout: this.config.timeoutMs });
  }

  buildFeedUrl(command?: string): string {
    const params = new URLSearchParams({ token: this.config.apiToken });
    if (command) {
      params.set('command', command);
    }

    const separator = this.config.baseUrl.includes('?') ? '&' : '?';
    return `${this.config.baseUrl}${separator}${params.toString()}`;
  }

  async fetchSnapshot(command?: string): Promise<Snapshot> {
    const requestedCommand = command && command.length > 0 ? command : undefined;
    logger.debug({ command: requestedCommand ?? null }, 'calling teslafi feed');

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(this.buildFeedUrl(requestedCommand), {
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
      });
    } catch (error) {
      const detail = describeTransportFailure(error);
      logger.warn({ command: requestedCommand ?? null, detail }, 'teslafi feed unreachable');
      throw new TeslafiApiError('TRANSPORT', `Error calling TeslaFi API: ${detail}`, {
        detail,
        command: requestedCommand,
        cause: error,
      });
    }

    const body = stringifyBody(response.data);

    if (response.status < 200 || response.status >= 300) {
      const detail = truncate(`${response.status} ${body}`.trim());
      logger.warn(
        { command: requestedCommand ?? null, status: response.status },
        'teslafi feed returned an error status',
      );
      throw new TeslafiApiError('TRANSPORT', `Error calling TeslaFi API: HTTP ${response.status}`, {
        detail,
        status: response.status,
        command: requestedCommand,
      });
    }

    const decoded = decodeBody(response.data);
    const parsed = decoded.ok
      ? parseFeedBody(decoded.value)
      : { ok: false as const, reason: 'malformed' as const, message: 'TeslaFi feed body is not JSON' };

    if (!parsed.ok && parsed.reason === 'rejected') {
      logger.warn(
        { command: requestedCommand ?? null, result: parsed.result },
        'teslafi feed rejected the request',
      );
      throw new TeslafiApiError(
        'UPSTREAM_REJECTED',
        `Unsuccessful TeslaFi API response: ${parsed.result}`,
        { detail: parsed.result, status: response.status, command: requestedCommand },
      );
    }

    if (!parsed.ok) {
      logger.warn({ command: requestedCommand ?? null }, parsed.message);
      throw new TeslafiApiError('MALFORMED_RESPONSE', parsed.message, {
        detail: truncate(body),
        status: response.status,
        command: requestedCommand,
      });
    }

    logger.debug(
      { command: requestedCommand ?? null, fieldCount: Object.keys(parsed.snapshot).length },
      'teslafi feed snapshot received',
    );

    return parsed.snapshot;
  }
}

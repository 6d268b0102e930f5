import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'node:fs/promises';
import { UploadFailureError } from '../pipeline/pipeline.errors';
import type { CoverageSink, CoverageUpload, CoverageUploadReceipt } from './coverage-sink';

export const DEFAULT_CODECOV_URL = 'https://codecov.io';

export type FetchFn = typeof fetch;

/** HTTP client used for uploads; the global fetch unless overridden. */
export const CODECOV_FETCH = Symbol('CODECOV_FETCH');

/**
 * Codecov v4 upload: POST asks for a storage URL, then the report is PUT there.
 * The first response line is the report page, the second the storage URL.
 */
@Injectable()
export class CodecovSink implements CoverageSink {
  private readonly logger = new Logger(CodecovSink.name);
  private readonly baseUrl: string;

  constructor(
    configService: ConfigService,
    @Inject(CODECOV_FETCH) private readonly fetchFn: FetchFn,
  ) {
    this.baseUrl = (configService.get<string>('CODECOV_URL') ?? DEFAULT_CODECOV_URL).replace(
      /\/+$/,
      '',
    );
  }

  async upload(request: CoverageUpload): Promise<CoverageUploadReceipt> {
    let report: string;
    try {
      report = await readFile(request.artifact.path, 'utf8');
    } catch (err) {
      throw new UploadFailureError(
        `Cannot read coverage report ${request.artifact.path}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    const query = new URLSearchParams({ package: 'checks-runner', token: request.token });
    if (request.commit) query.set('commit', request.commit);
    if (request.branch) query.set('branch', request.branch);
    if (request.flags.length) query.set('flags', request.flags.join(','));

    const handshake = await this.send(`${this.baseUrl}/upload/v4?${query.toString()}`, {
      method: 'POST',
      headers: { Accept: 'text/plain' },
      signal: request.signal,
    });
    const [reportUrl = '', storageUrl = ''] = (await handshake.text())
      .split(/\r?\n/)
      .map((line) => line.trim());
    if (!storageUrl) {
      throw new UploadFailureError('Codecov did not return an upload location');
    }

    await this.send(storageUrl, {
      method: 'PUT',
      headers: { 'Content-Type': 'text/plain' },
      body: report,
      signal: request.signal,
    });

    this.logger.log(`Uploaded ${request.artifact.name} (${Buffer.byteLength(report)} bytes)`);
    return { reportUrl };
  }

  private async send(url: string, init: RequestInit): Promise<Response> {
    let res: Response;
    try {
      res = await this.fetchFn(url, init);
    } catch (err) {
      throw new UploadFailureError(
        `Codecov unreachable: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    if (!res.ok) {
      throw new UploadFailureError(`Codecov responded with HTTP ${res.status}`, res.status);
    }
    return res;
  }
}

/**
 * kops Release Client
 *
 * Resolves the latest published kops release and downloads a platform
 * artifact from it. Single attempt per request; failures surface as Results.
 */

import { writeFile } from 'node:fs/promises';
import type { Logger } from 'pino';
import { z } from 'zod';
import { Success, Failure, type Platform, type Result } from '../../domain/types';
import { KOPS_RELEASES } from '../../config/defaults';
import { errorMessage } from '../../lib/errors';
import { withTimeout } from '../../shared/async';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface RequestOptions {
  timeout: number;
  signal?: AbortSignal;
}

export interface ReleaseClient {
  latestVersion: (options: RequestOptions) => Promise<Result<string>>;
  download: (
    version: string,
    platform: Platform,
    destination: string,
    options: RequestOptions,
  ) => Promise<Result<{ bytes: number; url: string }>>;
}

const LatestReleaseSchema = z.object({
  tag_name: z.string().min(1),
});

const ARTIFACTS: Record<Platform, string> = {
  linux: 'kops-linux-amd64',
  cloudshell: 'kops-linux-amd64',
  mac: 'kops-darwin-amd64',
};

export function artifactName(platform: Platform): string {
  return ARTIFACTS[platform];
}

export function artifactUrl(version: string, platform: Platform): string {
  return `${KOPS_RELEASES.downloadBaseUrl}/${version}/${artifactName(platform)}`;
}

export const createReleaseClient = (logger: Logger, fetchImpl: FetchLike = fetch): ReleaseClient => ({
  async latestVersion({ timeout, signal }) {
    const url = KOPS_RELEASES.latestReleaseUrl;
    try {
      const response = await withTimeout(
        (requestSignal) =>
          fetchImpl(url, {
            headers: { Accept: 'application/vnd.github+json' },
            signal: requestSignal,
          }),
        { timeoutMs: timeout, errorMessage: `GET ${url} timed out`, signal },
      );

      if (!response.ok) {
        return Failure(`GET ${url}: HTTP ${response.status}`);
      }

      const parsed = LatestReleaseSchema.safeParse(await response.json());
      if (!parsed.success) {
        return Failure(`GET ${url}: release metadata has no tag_name`);
      }

      logger.debug({ version: parsed.data.tag_name }, 'Resolved latest kops release');
      return Success(parsed.data.tag_name);
    } catch (error) {
      return Failure(`GET ${url}: ${errorMessage(error)}`);
    }
  },

  async download(version, platform, destination, { timeout, signal }) {
    const url = artifactUrl(version, platform);
    try {
      const bytes = await withTimeout(
        async (requestSignal) => {
          const response = await fetchImpl(url, { redirect: 'follow', signal: requestSignal });
          if (!response.ok) {
            throw new Error(`HTTP ${response.status}`);
          }
          const body = Buffer.from(await response.arrayBuffer());
          await writeFile(destination, body);
          return body.length;
        },
        { timeoutMs: timeout, errorMessage: `GET ${url} timed out`, signal },
      );

      logger.debug({ url, bytes }, 'Downloaded kops artifact');
      return Success({ bytes, url });
    } catch (error) {
      return Failure(`GET ${url}: ${errorMessage(error)}`);
    }
  },
});

/**
 * Build Service Client
 * Hands an approved item and the operator's requirements to the external build service
 */

import { z } from 'zod';
import type { Item, Rating } from '../db/models';
import { toItemSnapshot } from '../db/models';

export type BuildResult =
  | { status: 'success'; artifactUrl: string }
  | { status: 'failure'; reason: string };

export interface BuildCollaborator {
  build(item: Item, rating: Rating, requirements: string): Promise<BuildResult>;
}

const buildResponseSchema = z.object({
  artifactUrl: z.string().url(),
});

export interface HttpBuildClientOptions {
  serviceUrl: string;
  timeoutMs: number;
}

export class HttpBuildClient implements BuildCollaborator {
  constructor(private readonly options: HttpBuildClientOptions) {}

  async build(item: Item, rating: Rating, requirements: string): Promise<BuildResult> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await fetch(this.options.serviceUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ item: toItemSnapshot(item), rating, requirements }),
        signal: controller.signal,
      });

      if (!response.ok) {
        return { status: 'failure', reason: `HTTP ${response.status}: ${response.statusText}` };
      }

      const parsed = buildResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        return { status: 'failure', reason: 'build service returned no artifact URL' };
      }

      return { status: 'success', artifactUrl: parsed.data.artifactUrl };
    } catch (error) {
      if (controller.signal.aborted) {
        return { status: 'failure', reason: `build timed out after ${this.options.timeoutMs}ms` };
      }
      const message = error instanceof Error ? error.message : String(error);
      return { status: 'failure', reason: message };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Used when BUILD_SERVICE_URL is unset: every build fails
 */
export class UnavailableBuildClient implements BuildCollaborator {
  async build(): Promise<BuildResult> {
    return { status: 'failure', reason: 'build service not configured' };
  }
}

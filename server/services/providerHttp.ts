import { ProviderError, errorMessage } from '../errors';
import type { Logger } from '../logger';

export interface ProviderRequestOptions {
  timeoutMs: number;
  log: Logger;
}

/**
 * Pulls the human readable message out of a provider error body
 * (`{"error": {"message": "..."}}`), falling back to status + raw body.
 */
export const extractErrorMessage = (status: number, body: string): string => {
  try {
    const json: unknown = JSON.parse(body);
    if (typeof json === 'object' && json !== null && 'error' in json) {
      const { error } = json;
      if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return error.message;
      }
      if (typeof error === 'string') {
        return error;
      }
    }
  } catch {
    // Not JSON, keep the raw body.
  }
  return `HTTP ${status}: ${body}`;
};

export const providerFetch = async (
  url: string,
  init: RequestInit,
  { timeoutMs, log }: ProviderRequestOptions,
): Promise<Response> => {
  const method = init.method || 'GET';
  log.info(`-> ${method} ${url}`);

  let response: Response;
  try {
    response = await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    const detail = errorMessage(error);
    log.error(`x ${method} ${url}: ${detail}`);
    throw new ProviderError(`Provider request failed: ${detail}`, undefined, detail);
  }

  log.info(`<- ${response.status} ${url}`);

  if (!response.ok) {
    const body = await response.text();
    throw new ProviderError(extractErrorMessage(response.status, body), response.status, body);
  }

  return response;
};

export const readJson = async (response: Response): Promise<unknown> => {
  const body = await response.text();
  try {
    return JSON.parse(body);
  } catch {
    throw new ProviderError('Provider answered with invalid JSON', response.status, body);
  }
};

/** Maps an SDK failure (which may carry an HTTP `status`) onto a ProviderError. */
export const toProviderError = (error: unknown): ProviderError => {
  if (error instanceof ProviderError) return error;
  const statusCode =
    typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
      ? error.status
      : undefined;
  const detail = errorMessage(error);
  return new ProviderError(detail, statusCode, detail);
};

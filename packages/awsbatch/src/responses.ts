import { RemoteApiError } from '@batchrun/shared';

interface CheckedResponse {
  $metadata: { httpStatusCode?: number; requestId?: string };
  failures?: unknown[];
}

/**
 * Reject a response carrying a non-200 status code or a non-empty failure
 * list. The SDK already throws for most error statuses; this covers partial
 * failures reported in the body.
 */
export function assertApiSuccess<T extends CheckedResponse>(operation: string, response: T): T {
  if (response.failures && response.failures.length > 0) {
    throw new RemoteApiError(
      operation,
      `${response.failures.length} failure(s) reported`,
      response.$metadata.httpStatusCode,
      response.failures,
    );
  }

  const statusCode = response.$metadata.httpStatusCode;
  if (statusCode !== undefined && statusCode !== 200) {
    throw new RemoteApiError(operation, `received status code ${statusCode}`, statusCode, response.$metadata);
  }

  return response;
}

/** Narrow a required response field or fail with a RemoteApiError. */
export function requireField<T>(operation: string, field: string, value: T | undefined | null): T {
  if (value === undefined || value === null) {
    throw new RemoteApiError(operation, `response is missing ${field}`);
  }
  return value;
}

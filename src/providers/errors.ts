import axios from 'axios';
import { ConnectionError, ModelError, TimeoutError } from '../errors';

export interface EndpointDescription {
  baseUrl: string;
  model?: string;
  timeoutMs?: number;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Maps an axios failure to the connector taxonomy. Anything that is not an
 * HTTP failure is returned unchanged.
 */
export function toConnectorError(err: unknown, endpoint: EndpointDescription): unknown {
  if (!axios.isAxiosError(err)) return err;

  if (err.code && TIMEOUT_CODES.has(err.code)) {
    const limit = endpoint.timeoutMs !== undefined ? ` within ${endpoint.timeoutMs / 1000}s` : '';
    return new TimeoutError(`The model server at ${endpoint.baseUrl} did not respond${limit}`, { cause: err });
  }

  const status = err.response?.status;
  if (status === 404) {
    const name = endpoint.model ?? 'requested model';
    return new ModelError(`Model "${name}" is not available on ${endpoint.baseUrl}`, endpoint.model, { cause: err });
  }
  if (status !== undefined) {
    return new ModelError(
      `The model server at ${endpoint.baseUrl} returned HTTP ${status}`,
      endpoint.model,
      { cause: err }
    );
  }

  return new ConnectionError(`Could not reach the model server at ${endpoint.baseUrl}`, { cause: err });
}

/**
 * Shopify Admin Gateway
 *
 * AdminGateway backed by @shopify/admin-api-client. Every request goes
 * through a fetch bounded by the configured timeout; nothing is retried here.
 */

import { createAdminApiClient, createAdminRestApiClient } from '@shopify/admin-api-client';
import type { RuntimeConfig } from '../../types/config.types.js';
import { RemoteApplicationError, ResponseShapeError, TransportError, errorMessage } from '../errors.js';
import { Logger } from '../logger.js';
import type { AdminGateway, GraphQLVariables, RestBody, RestMethod, RestResponse } from './admin-gateway.js';

interface GraphQLErrorEntry {
  message: string;
  extensions?: { code?: string };
}

interface GraphQLPayload<T> {
  data?: T | null;
  errors?: GraphQLErrorEntry[];
}

type RestErrors = string | string[] | Record<string, string | string[]>;

/**
 * REST bodies report failures as `{ errors: "..." }` or `{ errors: { field: [...] } }`.
 */
export function flattenRestErrors(errors: RestErrors): string[] {
  if (typeof errors === 'string') {
    return [errors];
  }
  if (Array.isArray(errors)) {
    return errors;
  }
  return Object.entries(errors).map(([field, messages]) =>
    `${field}: ${Array.isArray(messages) ? messages.join(', ') : messages}`,
  );
}

export class ShopifyAdminGateway implements AdminGateway {
  private graphqlClient: ReturnType<typeof createAdminApiClient>;
  private restClient: ReturnType<typeof createAdminRestApiClient>;
  private timeoutMs: number;

  constructor(config: RuntimeConfig) {
    this.timeoutMs = config.timeoutMs;

    const customFetchApi: typeof fetch = (input, init) =>
      fetch(input, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });

    this.graphqlClient = createAdminApiClient({
      storeDomain: config.credentials.shopDomain,
      apiVersion: config.apiVersion,
      accessToken: config.credentials.accessToken,
      customFetchApi,
    });

    this.restClient = createAdminRestApiClient({
      storeDomain: config.credentials.shopDomain,
      apiVersion: config.apiVersion,
      accessToken: config.credentials.accessToken,
      customFetchApi,
    });
  }

  async graphql<T>(operation: string, query: string, variables: GraphQLVariables = {}): Promise<T> {
    Logger.debug(`GraphQL ${operation}`, JSON.stringify(variables));

    const { response, text } = await this.receive(operation, () => this.graphqlClient.fetch(query, { variables }));
    if (!response.ok) {
      throw new TransportError(`${operation}: API returned status ${response.status}: ${text}`, {
        status: response.status,
      });
    }

    let payload: GraphQLPayload<T>;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      throw new ResponseShapeError(`${operation}: response is not JSON: ${errorMessage(error)}`);
    }

    if (payload.errors && payload.errors.length > 0) {
      throw new RemoteApplicationError(
        operation,
        payload.errors.map((e) => (e.extensions?.code ? `${e.message} (${e.extensions.code})` : e.message)),
      );
    }
    if (payload.data === undefined || payload.data === null) {
      throw new ResponseShapeError(`${operation}: response has no data`);
    }
    return payload.data;
  }

  async rest<T>(method: RestMethod, path: string, body?: RestBody): Promise<RestResponse<T>> {
    Logger.debug(`REST ${method} ${path}`);

    const { response, text } = await this.receive(`${method} ${path}`, () => this.send(method, path, body));
    if (!response.ok) {
      throw new TransportError(`${method} ${path}: API returned status ${response.status}: ${text}`, {
        status: response.status,
      });
    }

    let parsed: T & { errors?: RestErrors };
    try {
      parsed = JSON.parse(text.trim() === '' ? '{}' : text);
    } catch (error) {
      throw new ResponseShapeError(`${method} ${path}: response is not JSON: ${errorMessage(error)}`);
    }
    if (parsed.errors !== undefined) {
      throw new RemoteApplicationError(`${method} ${path}`, flattenRestErrors(parsed.errors));
    }
    return { status: response.status, body: parsed };
  }

  /**
   * The timeout signal also covers reading the body.
   */
  private async receive(operation: string, request: () => Promise<Response>): Promise<{ response: Response; text: string }> {
    try {
      const response = await request();
      return { response, text: await response.text() };
    } catch (error) {
      throw this.transportFailure(operation, error);
    }
  }

  private send(method: RestMethod, path: string, body: RestBody = {}): Promise<Response> {
    switch (method) {
      case 'GET':
        return this.restClient.get(path);
      case 'POST':
        return this.restClient.post(path, { data: { ...body } });
      case 'PUT':
        return this.restClient.put(path, { data: { ...body } });
      case 'DELETE':
        return this.restClient.delete(path);
    }
  }

  private transportFailure(operation: string, error: unknown): TransportError {
    const timedOut = error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
    const reason = timedOut ? `timed out after ${this.timeoutMs}ms` : errorMessage(error);
    return new TransportError(`${operation}: request failed: ${reason}`, { cause: error });
  }
}

/**
 * Admin Gateway
 *
 * The two call shapes the tools use against the remote Admin API. Services
 * depend on this interface only; the production implementation lives in
 * shopify-admin-gateway.ts and tests use FakeAdminGateway.
 */

export type RestMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type GraphQLVariables = Record<string, unknown>;

export type RestBody = object;

export interface RestResponse<T> {
  status: number;
  body: T;
}

export interface AdminGateway {
  /**
   * Runs a GraphQL document and resolves with its `data`. GraphQL `errors`
   * reject with RemoteApplicationError, transport failures with TransportError.
   * `userErrors` inside mutation payloads are left to the caller.
   */
  graphql<T>(operation: string, query: string, variables?: GraphQLVariables): Promise<T>;

  /**
   * Calls a REST resource relative to the versioned admin root, e.g.
   * `orders` or `orders/123/transactions` (no `.json` suffix).
   */
  rest<T>(method: RestMethod, path: string, body?: RestBody): Promise<RestResponse<T>>;
}

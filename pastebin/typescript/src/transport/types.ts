/**
 * HTTP transport type definitions.
 */

export type HttpMethod = 'GET' | 'POST';

/**
 * HTTP request
 */
export interface HttpRequest {
  method: HttpMethod;
  /** Full URL */
  url: string;
  headers: Record<string, string>;
  /** Form-encoded body for POST requests */
  body?: string;
}

/**
 * HTTP response with a text body
 */
export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * HTTP transport interface. Implementations resolve with any status code and
 * reject only when no response was received.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Form fields; `undefined` values are left out of the body.
 */
export type FormFields = Record<string, string | number | undefined>;

/**
 * Encodes form fields as `application/x-www-form-urlencoded`.
 */
export function encodeForm(fields: FormFields): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      params.append(key, String(value));
    }
  }
  return params.toString();
}

/**
 * Helper to check if response is successful (2xx status)
 */
export function isSuccessResponse(response: HttpResponse): boolean {
  return response.status >= 200 && response.status < 300;
}


import { parse, type GenericSchema } from "valibot";
import { ApiError } from "../../../protocol/src/errors.js";
import { parseErrorCode } from "../../../protocol/src/status.js";
import { logger } from "../observability/logger.js";

export type HttpMethod = "GET" | "POST" | "DELETE";

export interface ApiRequest {
  method: HttpMethod;
  path: string;
  token?: string;
  body?: unknown;
}

export interface ApiResponse {
  status: number;
  ok: boolean;
  text: string;
  json: unknown;
}

/**
 * Minimal JSON-over-HTTP client for the DFX REST API
 */
export class ApiHttpClient {
  constructor(private readonly baseUrl: string) {}

  /**
   * Perform a request and return the raw response, whatever its status
   */
  async send(endpoint: string, request: ApiRequest): Promise<ApiResponse> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (request.token) {
      headers.Authorization = `Bearer ${request.token}`;
    }

    const url = `${this.baseUrl}${request.path}`;
    logger.debug(`${request.method} ${url}`, { endpoint });

    const response = await fetch(url, {
      method: request.method,
      headers,
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
    });

    const text = await response.text();
    let json: unknown;
    try {
      json = text ? JSON.parse(text) : undefined;
    } catch {
      // Non-JSON body; callers get the text
      json = undefined;
    }

    return { status: response.status, ok: response.ok, text, json };
  }

  /**
   * Perform a request, fail on non-2xx, and validate the JSON body
   */
  async request<T>(
    endpoint: string,
    request: ApiRequest,
    schema: GenericSchema<unknown, T>
  ): Promise<T> {
    const response = await this.send(endpoint, request);
    if (!response.ok) {
      throw new ApiError(
        endpoint,
        response.status,
        parseErrorCode(response.json ?? response.text)
      );
    }
    return parse(schema, response.json);
  }
}

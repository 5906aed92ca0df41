/**
 * Consumption usageDetails page source
 *
 * Fetches one page of usage details via the ARM REST API, following
 * `nextLink` as the continuation token.
 */

import type { AccessToken, TokenCredential } from "@azure/identity";
import { UsageError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { UsagePageRequest, UsagePageSource } from "./types.js";

export const ARM_ENDPOINT = "https://management.azure.com";
export const ARM_SCOPE = "https://management.azure.com/.default";

export type ConsumptionRestSourceOptions = {
  /** Preferred api-version. 2023-05-01 includes payGPrice. */
  apiVersion?: string;
  /** Used once when the preferred version is rejected. */
  fallbackApiVersion?: string;
  endpoint?: string;
  logger?: Logger;
  fetchImpl?: typeof fetch;
};

/**
 * Error raised for a non-2xx ARM response. Shaped like Azure SDK errors so the
 * retry classifier can read `statusCode`, `code` and `headers`.
 */
export class ConsumptionRequestError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly headers: Record<string, string>;

  constructor(message: string, statusCode: number, code: string, headers: Record<string, string>) {
    super(message);
    this.name = "ConsumptionRequestError";
    this.statusCode = statusCode;
    this.code = code;
    this.headers = headers;
  }
}

/** Credential wrapper for a bearer token obtained elsewhere (e.g. `az account get-access-token`). */
export function staticTokenCredential(token: string, expiresOnTimestamp = Date.now() + 3_600_000): TokenCredential {
  return {
    async getToken(): Promise<AccessToken> {
      return { token, expiresOnTimestamp };
    },
  };
}

function readArmError(body: unknown): { code: string; message: string } {
  if (typeof body !== "object" || body === null) return { code: "", message: "" };
  const error: unknown = Reflect.get(body, "error");
  if (typeof error !== "object" || error === null) return { code: "", message: "" };
  const code: unknown = Reflect.get(error, "code");
  const message: unknown = Reflect.get(error, "message");
  return {
    code: typeof code === "string" ? code : "",
    message: typeof message === "string" ? message : "",
  };
}

export class ConsumptionRestSource implements UsagePageSource {
  private credential: TokenCredential;
  private apiVersion: string;
  private fallbackApiVersion?: string;
  private endpoint: string;
  private logger: Logger;
  private fetchImpl: typeof fetch;

  constructor(credential: TokenCredential, options: ConsumptionRestSourceOptions = {}) {
    this.credential = credential;
    this.apiVersion = options.apiVersion ?? "2023-05-01";
    this.fallbackApiVersion = options.fallbackApiVersion;
    this.endpoint = options.endpoint ?? ARM_ENDPOINT;
    this.logger = options.logger ?? silentLogger;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /** api-version currently used for first-page requests. */
  getApiVersion(): string {
    return this.apiVersion;
  }

  buildFirstPageUrl(request: Pick<UsagePageRequest, "subscriptionId" | "startDate" | "endDate">): string {
    const base = `${this.endpoint}/subscriptions/${encodeURIComponent(request.subscriptionId)}/providers/Microsoft.Consumption/usageDetails`;
    const params = [
      `startDate=${request.startDate}`,
      `endDate=${request.endDate}`,
      `api-version=${this.apiVersion}`,
      "$expand=meterDetails,additionalInfo",
    ];
    return `${base}?${params.join("&")}`;
  }

  async fetchPage(request: UsagePageRequest): Promise<unknown> {
    if (request.continuationToken !== undefined) {
      this.assertSameOrigin(request.continuationToken, request.pageIndex);
    }
    const url = request.continuationToken ?? this.buildFirstPageUrl(request);
    try {
      return await this.get(url);
    } catch (error) {
      if (!this.shouldFallBack(request, error)) throw error;
      const rejected = this.apiVersion;
      this.apiVersion = this.fallbackApiVersion ?? rejected;
      this.fallbackApiVersion = undefined;
      this.logger.warn(
        { rejected, fallback: this.apiVersion },
        "api-version rejected, retrying first page with fallback version",
      );
      return this.get(this.buildFirstPageUrl(request));
    }
  }

  /** The bearer token is only ever sent to the configured endpoint. */
  private assertSameOrigin(nextLink: string, pageIndex: number): void {
    const expected = new URL(this.endpoint).origin;
    let origin: string;
    try {
      origin = new URL(nextLink).origin;
    } catch (error) {
      throw new UsageError("MalformedResponse", `nextLink is not a URL: "${nextLink}"`, {
        stage: "fetch",
        pageIndex,
        cause: error,
      });
    }
    if (origin !== expected) {
      throw new UsageError("MalformedResponse", `nextLink points to ${origin}, expected ${expected}`, {
        stage: "fetch",
        pageIndex,
      });
    }
  }

  private shouldFallBack(request: UsagePageRequest, error: unknown): boolean {
    if (request.continuationToken || !this.fallbackApiVersion) return false;
    if (!(error instanceof ConsumptionRequestError) || error.statusCode !== 400) return false;
    return error.message.toLowerCase().includes("api-version");
  }

  private async get(url: string): Promise<unknown> {
    const token = await this.credential.getToken(ARM_SCOPE);
    if (!token) {
      throw new ConsumptionRequestError("Credential returned no access token", 401, "NoToken", {});
    }

    const response = await this.fetchImpl(url, {
      headers: {
        Authorization: `Bearer ${token.token}`,
        "Content-Type": "application/json",
      },
    });

    const text = await response.text();
    let body: unknown = undefined;
    let parseError: unknown = undefined;
    try {
      body = text.length > 0 ? JSON.parse(text) : undefined;
    } catch (error) {
      parseError = error;
    }

    if (!response.ok) {
      const armError = readArmError(body);
      const headers: Record<string, string> = {};
      const retryAfter = response.headers.get("retry-after");
      if (retryAfter) headers["retry-after"] = retryAfter;
      const requestId = response.headers.get("x-ms-request-id");
      if (requestId) headers["x-ms-request-id"] = requestId;
      throw new ConsumptionRequestError(
        `Consumption API error: ${response.status} ${armError.message || response.statusText}`,
        response.status,
        armError.code,
        headers,
      );
    }

    if (parseError !== undefined) {
      throw new UsageError("MalformedResponse", "Consumption API returned a body that is not JSON", {
        stage: "fetch",
        cause: parseError,
      });
    }
    return body;
  }
}

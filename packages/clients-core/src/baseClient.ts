import axios, { type AxiosRequestConfig } from "axios";

export interface ClientConfig {
  /** Base URL for the API server (e.g., "http://localhost:3000") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
}

export interface RequestParams {
  /** Sub-path segments under the resource; each is URL-encoded */
  path?: string | readonly string[];
  body?: unknown;
  query?: Record<string, unknown>;
  signal?: AbortSignal;
}

export class BaseClient {
  protected baseUrl: string;
  protected resource: string;
  protected timeout: number;

  constructor(resource: string, config: ClientConfig) {
    this.resource = "/" + resource;
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout ?? 30000;
  }

  protected buildPath(params: RequestParams): string {
    if (params.path === undefined) return this.resource;
    const segments = typeof params.path === "string" ? [params.path] : params.path;
    return [this.resource, ...segments.map(encodeURIComponent)].join("/");
  }

  protected buildConfig(params: RequestParams): AxiosRequestConfig {
    const config: AxiosRequestConfig = {
      baseURL: this.baseUrl,
      timeout: this.timeout,
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
      },
    };

    if (params.query) {
      config.params = params.query;
    }
    if (params.signal) {
      config.signal = params.signal;
    }

    return config;
  }

  public async get<T>(params: RequestParams = {}): Promise<T> {
    const response = await axios.get<T>(this.buildPath(params), this.buildConfig(params));
    return response.data;
  }

  public async post<T>(params: RequestParams = {}): Promise<T> {
    const response = await axios.post<T>(this.buildPath(params), params.body, this.buildConfig(params));
    return response.data;
  }

  public async put<T>(params: RequestParams = {}): Promise<T> {
    const response = await axios.put<T>(this.buildPath(params), params.body, this.buildConfig(params));
    return response.data;
  }

  public async delete<T>(params: RequestParams = {}): Promise<T> {
    const response = await axios.delete<T>(this.buildPath(params), this.buildConfig(params));
    return response.data;
  }
}

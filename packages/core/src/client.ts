import Axios from 'axios'

/**
 * ApiResponse<T> is the type for the raw data for an instance of T that is
 * returned by the library API.
 *
 * ```ts
 * interface Foo {
 *  a: Date
 * }
 *
 * ApiResponse<Foo> == interface {
 *  a: string
 * }
 * ```
 */
export type ApiResponse<T> = T extends Date
  ? string
  : T extends object
  ? { [K in keyof T]: ApiResponse<T[K]> }
  : T

/**
 * Options of {@link createClient}.
 */
export interface ClientOptions {
  /**
   * Additional request headers. `Content-Type` is always `application/json`.
   */
  headers?: Record<string, string>

  /**
   * Request timeout in milliseconds.
   */
  timeout?: number
}

/**
 * Creates the library API client.
 *
 * @param baseUrl Base URL of the library API.
 */
export function createClient(baseUrl: string, options?: ClientOptions) {
  return Axios.create({
    baseURL: baseUrl,
    timeout: options?.timeout,
    headers: {
      ...options?.headers,
      'Content-Type': 'application/json',
    },
  })
}

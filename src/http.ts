import axios, { AxiosRequestConfig } from 'axios';

export interface HttpResponse {
    status: number;
    data: unknown;
}

export type HttpRequestOptions = Pick<AxiosRequestConfig, 'timeout' | 'params' | 'headers'>;

/** The slice of axios the job talks through; tests hand in a stub. */
export interface HttpClient {
    get(url: string, config?: HttpRequestOptions): Promise<HttpResponse>;
    post(url: string, data?: unknown, config?: HttpRequestOptions): Promise<HttpResponse>;
}

export const defaultHttpClient: HttpClient = axios;

export function describeHttpError(error: unknown): string {
    if (axios.isAxiosError(error)) {
        if (error.response) {
            const body = typeof error.response.data === 'string'
                ? error.response.data
                : JSON.stringify(error.response.data ?? '');
            return `HTTP ${error.response.status}: ${body.slice(0, 300)}`;
        }
        return error.code ? `${error.code}: ${error.message}` : error.message;
    }
    return error instanceof Error ? error.message : String(error);
}

/** Status of a rejected axios response, when there was one. */
export function httpStatusOf(error: unknown): number | undefined {
    return axios.isAxiosError(error) ? error.response?.status : undefined;
}

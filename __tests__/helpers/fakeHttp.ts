import axios, { AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

/**
 * Scripted downstream replies, consumed one per request.
 */
export type FakeReply =
    | { status: number; body?: unknown; headers?: Record<string, string> }
    | 'network'
    | 'timeout'
    | 'hang';

export interface FakeHttp {
    http: AxiosInstance;
    requests: InternalAxiosRequestConfig[];
    replies: FakeReply[];
}

/**
 * An axios instance whose adapter answers from a script instead of the network.
 */
export function fakeHttp(replies: FakeReply[] = []): FakeHttp {
    const requests: InternalAxiosRequestConfig[] = [];

    const http = axios.create({
        adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
            requests.push(config);
            const reply = replies.shift();
            if (reply === undefined) {
                throw new Error(`Unexpected request to ${config.url ?? '(no url)'}`);
            }
            if (reply === 'network') {
                throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
            }
            if (reply === 'timeout') {
                throw new AxiosError('timeout of 1000ms exceeded', 'ECONNABORTED', config);
            }
            if (reply === 'hang') {
                // Never answers; fails only once the request is aborted
                return new Promise<AxiosResponse>((_resolve, reject) => {
                    config.signal?.addEventListener?.('abort', () => {
                        reject(new AxiosError('canceled', AxiosError.ERR_CANCELED, config));
                    });
                });
            }
            return {
                data: typeof reply.body === 'string' ? reply.body : JSON.stringify(reply.body ?? null),
                status: reply.status,
                statusText: '',
                headers: reply.headers ?? {},
                config
            };
        }
    });

    return { http, requests, replies };
}

/**
 * In-process stand-in for the Make REST API, plugged into axios as an
 * adapter. Routes are keyed by "METHOD /path"; anything else answers 404.
 */
import { AxiosError, type AxiosAdapter, type AxiosResponse } from 'axios';

export interface RecordedRequest {
    method: string;
    url: string;
    params: unknown;
    data: unknown;
    authorization: string;
}

export interface StubResponse {
    status?: number;
    body: unknown;
}

export type Route = StubResponse | ((request: RecordedRequest) => StubResponse);

export function createFakeMakeApi(routes: Record<string, Route>) {
    const requests: RecordedRequest[] = [];

    const adapter: AxiosAdapter = async (config) => {
        const request: RecordedRequest = {
            method: (config.method ?? 'get').toUpperCase(),
            url: config.url ?? '',
            params: config.params,
            data: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
            authorization: String(config.headers.get('Authorization')),
        };
        requests.push(request);

        const route = routes[`${request.method} ${request.url}`];
        const stub = route === undefined
            ? { status: 404, body: { message: 'Not found' } }
            : typeof route === 'function' ? route(request) : route;
        const status = stub.status ?? 200;

        const response: AxiosResponse = {
            data: stub.body,
            status,
            statusText: String(status),
            headers: {},
            config,
        };
        if (status >= 400) {
            throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_REQUEST, config, null, response);
        }
        return response;
    };

    return { adapter, requests };
}

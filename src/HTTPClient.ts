import axios, { CreateAxiosDefaults } from "axios";

export interface HTTPRequest {
    headers: Record<string, string>;
    signal?: AbortSignal;
}

export interface HTTPResponse {
    status: number;
    statusText: string;
    data: string | Buffer;
}

/** Performs a GET. Resolves for every HTTP status; rejects only on transport failure. */
export interface HTTPClient {
    get(url: string, request: HTTPRequest): Promise<HTTPResponse>;
}

export function createHTTPClient(defaults: CreateAxiosDefaults = {}): HTTPClient {
    const instance = axios.create({
        ...defaults,
        responseType: "text",
        // Metadata is XML; keep the body exactly as received.
        transformResponse: (data) => data,
        validateStatus: () => true,
    });

    return {
        async get(url, request) {
            const res = await instance.get<string>(url, {
                headers: request.headers,
                signal: request.signal,
            });
            return { status: res.status, statusText: res.statusText, data: res.data };
        },
    };
}

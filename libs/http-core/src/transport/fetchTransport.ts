import type { HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';

function abortReason(signal: AbortSignal): string {
  const { reason } = signal;
  if (reason instanceof Error) return reason.message;
  return reason === undefined ? 'aborted' : String(reason);
}

function readHeaders(response: Response): HttpHeaders {
  const headers: HttpHeaders = {};
  response.headers.forEach((value, name) => {
    headers[name] = value;
  });
  return headers;
}

/**
 * Transport over the global fetch API. Every HTTP status resolves. A
 * rejection is either the connection failure fetch reported or, once the
 * attempt signal has fired, an AbortError naming the request and the reason.
 */
export const fetchTransport: HttpTransport = async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
  try {
    const response = await fetch(req.url, { method: req.method, headers: req.headers, body: req.body, signal });
    return {
      status: response.status,
      headers: readHeaders(response),
      body: new Uint8Array(await response.arrayBuffer()),
    };
  } catch (error) {
    if (!signal.aborted) throw error;
    const aborted = new Error(`${req.method} ${new URL(req.url).pathname} aborted: ${abortReason(signal)}`, {
      cause: error,
    });
    aborted.name = 'AbortError';
    throw aborted;
  }
};

import fetch from 'node-fetch';
import { HttpTransport } from '../../core/interfaces/IHttpTransport.js';

/**
 * Default transport backed by node-fetch. The response body is a Node
 * readable stream, consumed chunk by chunk.
 */
export const nodeFetchTransport: HttpTransport = async (url, request) => {
  return fetch(url, {
    method: request.method,
    headers: request.headers,
    body: request.body,
    signal: request.signal,
  });
};

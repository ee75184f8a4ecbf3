/**
 * serverFetch against an in-process HTTP server on an ephemeral port
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import http from 'node:http';
import serverFetch, { buildUrl, HttpStatusError } from '../server/server_fetch.js';

describe('serverFetch', () => {
    let server: http.Server;
    let baseUrl: string;
    const seen: Array<{ method: string | undefined; url: string | undefined }> = [];

    beforeAll(async () => {
        server = http.createServer((req, res) => {
            seen.push({ method: req.method, url: req.url });
            if (req.url?.startsWith('/p/')) {
                res.writeHead(200, { 'content-type': 'application/json' });
                res.end('{"detections":[]}');
            } else if (req.url === '/hc/') {
                res.writeHead(200, { 'content-type': 'text/plain' });
                res.end('ok');
            } else if (req.url === '/empty') {
                res.writeHead(200);
                res.end();
            } else {
                res.writeHead(404);
                res.end('missing');
            }
        });
        await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
        const address = server.address();
        baseUrl = `http://127.0.0.1:${address !== null && typeof address === 'object' ? address.port : 0}`;
    });

    afterAll(async () => {
        await new Promise<void>((resolve) => server.close(() => resolve()));
    });

    it('should GET with the query and decode JSON', async () => {
        const body = await serverFetch(`${baseUrl}/p/`, { query: { img: 'http://monitor.local/latest_frame.png' } });

        expect(body).toEqual({ kind: 'json', value: { detections: [] } });
        expect(seen.at(-1)).toEqual({ method: 'GET', url: '/p/?img=http%3A%2F%2Fmonitor.local%2Flatest_frame.png' });
    });

    it('should decode text and empty bodies', async () => {
        expect(await serverFetch(`${baseUrl}/hc/`)).toEqual({ kind: 'text', value: 'ok' });
        expect(await serverFetch(`${baseUrl}/empty`)).toEqual({ kind: 'empty' });
    });

    it('should reject other status codes', async () => {
        const request = serverFetch(`${baseUrl}/nope`);

        await expect(request).rejects.toBeInstanceOf(HttpStatusError);
        await expect(request).rejects.toThrow('Request Failed: Status Code: 404');
    });
});

describe('buildUrl', () => {
    it('should leave a URL without query untouched', () => {
        expect(buildUrl('http://ml_api:3333/hc/')).toBe('http://ml_api:3333/hc/');
    });
});

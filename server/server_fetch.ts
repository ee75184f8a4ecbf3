import http from 'http'
import https from 'https'

export interface FetchOptions {
    /** Socket timeout in milliseconds */
    timeout?: number;
    query?: Record<string, string>;
}

export type FetchBody =
    | { kind: 'json'; value: unknown }
    | { kind: 'text'; value: string }
    | { kind: 'empty' };

export class HttpStatusError extends Error {
    constructor(readonly statusCode: number, readonly url: string) {
        super(`Request Failed: Status Code: ${statusCode}`)
        this.name = 'HttpStatusError'
    }
}

export function buildUrl(base: string, query?: Record<string, string>): string {
    if (!query || Object.keys(query).length === 0) return base
    const url = new URL(base)
    for (const [k, v] of Object.entries(query)) {
        url.searchParams.set(k, v)
    }
    return url.toString()
}

/**
 * GET `url` and decode the response by content type
 */
export default async function serverFetch(url: string, opts: FetchOptions = {}): Promise<FetchBody> {

    const target = buildUrl(url, opts.query)
    const transport = target.startsWith('https:') ? https : http

    return new Promise<FetchBody>(function (resolve, reject) {
        const req = transport.request(target, { method: 'GET' }, (res) => {

            if (res.statusCode !== 200 && res.statusCode !== 201) {
                // Consume response data to free up memory
                res.resume()
                reject(new HttpStatusError(res.statusCode ?? 0, target))
                return
            }

            const contentType = res.headers['content-type'] ?? ''

            // collect the data chunks
            const chunks: Buffer[] = []
            res.on('data', (chunk: Buffer) => {
                chunks.push(chunk)
            })
            res.on('error', (e: Error) => reject(e))
            res.on('end', () => {

                if (chunks.length === 0) {
                    resolve({ kind: 'empty' })
                    return
                }

                const text = Buffer.concat(chunks).toString('utf8')
                if (/^application\/json/.test(contentType)) {
                    try {
                        resolve({ kind: 'json', value: JSON.parse(text) })
                    } catch (e) {
                        reject(new Error(`server_fetch: invalid JSON from ${target}: ${String(e)}`))
                    }
                } else if (/^text\//.test(contentType) || contentType === '') {
                    resolve({ kind: 'text', value: text })
                } else {
                    reject(new Error(`Unknown content-type : ${contentType}`))
                }
            })
        }).on('error', (e: Error) => {
            reject(e)
        }).on('timeout', () => {
            reject(new Error(`network request timeout url=${target}`))
            req.destroy()
        })

        // Set timeout if specified in options
        if (opts.timeout) {
            req.setTimeout(opts.timeout)
        }

        req.end()

    })
}

import { type IncomingMessage, type ServerResponse, createServer } from 'node:http'
import * as net from 'node:net'

export interface RecordedRequest {
    method: string
    path: string
    query: Record<string, string>
    headers: IncomingMessage['headers']
    body: string
}

export type RouteHandler = (request: RecordedRequest, res: ServerResponse) => void

export interface CapabilityServer {
    baseURL: string
    requests: RecordedRequest[]
    close(): Promise<void>
}

export function sendJSON(res: ServerResponse, status: number, body: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' })
    res.end(JSON.stringify(body))
}

export function sendText(res: ServerResponse, status: number, body: string): void {
    res.writeHead(status, { 'Content-Type': 'text/plain' })
    res.end(body)
}

async function readBody(req: IncomingMessage): Promise<string> {
    const chunks: Buffer[] = []
    for await (const chunk of req) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
    return Buffer.concat(chunks).toString('utf-8')
}

/** In-process tools server on 127.0.0.1. Routes are keyed as `METHOD /path`. */
export function startCapabilityServer(routes: Record<string, RouteHandler>): Promise<CapabilityServer> {
    const requests: RecordedRequest[] = []

    const handle = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
        const url = new URL(req.url ?? '/', 'http://127.0.0.1')
        const recorded: RecordedRequest = {
            method: req.method ?? 'GET',
            path: url.pathname,
            query: Object.fromEntries(url.searchParams),
            headers: req.headers,
            body: await readBody(req),
        }
        requests.push(recorded)

        const handler = routes[`${recorded.method} ${recorded.path}`]
        if (!handler) {
            sendJSON(res, 404, { detail: 'Not Found' })
            return
        }
        handler(recorded, res)
    }

    const server = createServer((req, res) => {
        handle(req, res).catch(() => {
            res.destroy()
        })
    })

    return new Promise((resolve, reject) => {
        server.on('error', reject)
        server.listen(0, '127.0.0.1', () => {
            const address = server.address()
            if (!address || typeof address === 'string') {
                server.close()
                reject(new Error('capability server did not bind a port'))
                return
            }
            resolve({
                baseURL: `http://127.0.0.1:${address.port}`,
                requests,
                close: () =>
                    new Promise<void>((done) => {
                        server.closeAllConnections()
                        server.close(() => done())
                    }),
            })
        })
    })
}

/** A port that was free a moment ago and has nothing listening on it. */
export function allocateClosedPort(): Promise<number> {
    return new Promise((resolve, reject) => {
        const server = net.createServer()
        server.unref()
        server.on('error', reject)
        server.listen(0, '127.0.0.1', () => {
            const address = server.address()
            if (!address || typeof address === 'string') {
                server.close()
                reject(new Error('port allocation failed'))
                return
            }
            const port = address.port
            server.close((error) => {
                if (error) {
                    reject(error)
                    return
                }
                resolve(port)
            })
        })
    })
}

import { createServer as createHttpServer, type IncomingMessage, type ServerResponse } from 'node:http'
import type { Dashboard, Logger, PriceQueries, ValidationErrorEntry } from '@mtg-price-tracker/core'
import {
  ConfigError,
  ConnectionError,
  PriceTrackerError,
  SelectionState,
  searchTable,
  silentLogger,
  summarizeLaunchWindow,
  summarizePrices,
  validateCardId,
  ValidationError,
} from '@mtg-price-tracker/core'

// ── Types ──────────────────────────────────────────────────────

export interface ServerConfig {
  readonly port?: number | undefined
  readonly host?: string | undefined
  readonly dashboard: Dashboard
  readonly queries: PriceQueries
  readonly selection?: SelectionState | undefined
  readonly logger?: Logger | undefined
}

export interface PriceTrackerServer {
  start(): Promise<void>
  stop(): Promise<void>
  url: string
}

class HttpError extends Error {
  readonly status: number
  readonly code: string
  constructor(status: number, code: string, message: string) {
    super(message)
    this.name = 'HttpError'
    this.status = status
    this.code = code
  }
}

// ── Error mapping ──────────────────────────────────────────────

function errorToStatus(err: unknown): number {
  if (err instanceof HttpError) return err.status
  if (err instanceof ValidationError) return 400
  if (err instanceof ConfigError) return 500
  if (err instanceof ConnectionError) return 503
  return 500
}

function errorToBody(err: unknown): object {
  if (err instanceof HttpError) return { code: err.code, message: err.message }
  if (err instanceof PriceTrackerError) return err.toJSON()
  const msg = err instanceof Error ? err.message : String(err)
  return { code: 'INTERNAL_ERROR', message: msg }
}

// ── Helpers ────────────────────────────────────────────────────

export const MAX_BODY_BYTES = 16 * 1024

function readBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const tooLarge = new HttpError(413, 'PAYLOAD_TOO_LARGE', `Request body exceeds ${MAX_BODY_BYTES} bytes`)
    if (Number(req.headers['content-length'] ?? 0) > MAX_BODY_BYTES) {
      req.resume()
      reject(tooLarge)
      return
    }
    const chunks: Buffer[] = []
    let received = 0
    req.on('data', (chunk: Buffer) => {
      received += chunk.length
      // Keep draining so the response can still be written
      if (received <= MAX_BODY_BYTES) chunks.push(chunk)
    })
    req.on('end', () => {
      if (received > MAX_BODY_BYTES) {
        reject(tooLarge)
        return
      }
      try {
        const raw = Buffer.concat(chunks).toString('utf-8')
        resolve(raw.length > 0 ? JSON.parse(raw) : undefined)
      } catch {
        reject(new HttpError(400, 'INVALID_JSON', 'Request body is not valid JSON'))
      }
    })
    req.on('error', reject)
  })
}

function respond(res: ServerResponse, status: number, body: unknown): void {
  const json = JSON.stringify(body)
  res.writeHead(status, { 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(json) })
  res.end(json)
}

function parseLimit(raw: string | null): number | undefined {
  if (raw === null || raw.trim() === '') return undefined
  return Number(raw)
}

function requireFragments(name: string, set: string): void {
  const errors: ValidationErrorEntry[] = []
  if (name.trim() === '') {
    errors.push({ code: 'MISSING_PARAMETER', message: 'name is required', details: { parameter: 'name' } })
  }
  if (set.trim() === '') {
    errors.push({ code: 'MISSING_PARAMETER', message: 'set is required', details: { parameter: 'set' } })
  }
  if (errors.length > 0) throw new ValidationError('cardSearch', errors)
}

function decodePathSegment(segment: string): string {
  try {
    return decodeURIComponent(segment)
  } catch {
    throw new HttpError(400, 'INVALID_PATH', `Malformed path segment: ${segment}`)
  }
}

const PRICES_PATH = /^\/cards\/([^/]+)\/prices$/

// ── Server factory ─────────────────────────────────────────────

export function createServer(config: ServerConfig): PriceTrackerServer {
  const port = config.port ?? 3000
  const host = config.host ?? '0.0.0.0'
  const { dashboard, queries } = config
  const selection = config.selection ?? new SelectionState()
  const logger = config.logger ?? silentLogger

  async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? 'GET'
    const { pathname, searchParams } = new URL(req.url ?? '/', 'http://localhost')
    const pricedCardId = PRICES_PATH.exec(pathname)?.[1]

    try {
      if (method === 'GET' && pathname === '/health') {
        const result = await dashboard.healthCheck()
        respond(res, result.healthy ? 200 : 503, result)
      } else if (method === 'GET' && pathname === '/dashboard') {
        const view = await dashboard.render({
          nameFragment: searchParams.get('name') ?? '',
          setFragment: searchParams.get('set') ?? '',
          cardId: searchParams.get('cardId') ?? selection.selectedCardId,
          searchLimit: parseLimit(searchParams.get('limit')),
        })
        respond(res, 200, view)
      } else if (method === 'GET' && pathname === '/cards/search') {
        const name = searchParams.get('name') ?? ''
        const set = searchParams.get('set') ?? ''
        requireFragments(name, set)
        const outcome = await queries.searchCards(name, set, { limit: parseLimit(searchParams.get('limit')) })
        respond(res, 200, { ...outcome, table: searchTable(outcome.rows) })
      } else if (method === 'GET' && pricedCardId !== undefined) {
        const outcome = await queries.priceHistory(decodePathSegment(pricedCardId))
        respond(res, 200, { ...outcome, summary: outcome.status === 'ok' ? summarizePrices(outcome.rows) : null })
      } else if (method === 'GET' && pathname === '/sets/launch-window') {
        const outcome = await queries.launchWindow()
        respond(res, 200, {
          ...outcome,
          summary: outcome.status === 'ok' ? summarizeLaunchWindow(outcome.rows) : null,
        })
      } else if (method === 'POST' && pathname === '/selection') {
        const body = await readBody(req)
        if (typeof body !== 'object' || body === null || !('cardId' in body) || typeof body.cardId !== 'string') {
          throw new HttpError(400, 'INVALID_BODY', 'Request body must be an object with a string cardId')
        }
        const err = validateCardId(body.cardId)
        if (err !== null) throw err
        const changed = selection.select(body.cardId.trim())
        respond(res, 200, { selectedCardId: selection.selectedCardId, changed })
      } else if (method === 'GET' && pathname === '/cache') {
        respond(res, 200, dashboard.cacheInfo())
      } else if (method === 'POST' && pathname === '/cache/clear') {
        respond(res, 200, dashboard.clearCache())
      } else {
        respond(res, 404, { code: 'NOT_FOUND', message: `${method} ${pathname} not found` })
      }
    } catch (err) {
      const status = errorToStatus(err)
      if (status >= 500) logger.error({ err, method, path: pathname }, 'request failed')
      respond(res, status, errorToBody(err))
    }
  }

  const server = createHttpServer((req: IncomingMessage, res: ServerResponse) => {
    handleRequest(req, res).catch((err: unknown) => {
      logger.error({ err }, 'unhandled request error')
      if (!res.headersSent) {
        respond(res, 500, { code: 'INTERNAL_ERROR', message: err instanceof Error ? err.message : String(err) })
      }
    })
  })

  const displayHost = host === '0.0.0.0' ? 'localhost' : host

  const result: PriceTrackerServer = {
    url: `http://${displayHost}:${port}`,
    start() {
      return new Promise<void>((resolve, reject) => {
        server.on('error', reject)
        server.listen(port, host, () => {
          const addr = server.address()
          if (addr && typeof addr === 'object') {
            result.url = `http://${displayHost}:${addr.port}`
          }
          logger.info({ url: result.url }, 'server listening')
          resolve()
        })
      })
    },
    stop() {
      return new Promise<void>((resolve, reject) => {
        server.close((err: Error | undefined) => (err ? reject(err) : resolve()))
      })
    },
  }

  return result
}

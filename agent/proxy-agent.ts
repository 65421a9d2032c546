import http from 'http'
import https from 'https'
import net from 'net'
import tls from 'tls'
import type { AddressInfo } from 'net'
import type { Duplex } from 'stream'
import type { ControlChannel } from '../shared/control-channel.js'
import { toErrorMessage } from '../shared/errors.js'
import { normalizeHeaders, omitHeaders } from '../shared/headers.js'
import type { Logger } from '../shared/logger.js'
import { applyModifications, isUnmodified, synthesizeResponse } from '../shared/response-merge.js'
import { describeRequest } from '../shared/structured-url.js'
import type { FlowSubmission, MockDecision, RequestSnapshot, ResponseSnapshot } from '../shared/types.js'
import { generateId } from '../shared/utils.js'
import { decompressBody } from './body.js'
import type { CertificateAuthority } from './ca.js'
import { awaitDecision } from './decision.js'

export interface ProxyAgentOptions {
  channel: ControlChannel
  logger: Logger
  /** Without a CA, CONNECT tunnels are relayed without interception */
  ca?: CertificateAuthority
  queryMockFirst?: boolean
  /** Accept upstream certificates that fail verification */
  upstreamInsecure?: boolean
  /** Skip the inspector entirely while this resolves false */
  isReachable?: () => Promise<boolean>
}

interface Target {
  scheme: 'http' | 'https'
  hostname: string
  port: number
}

interface UpstreamResponse {
  statusCode: number
  reason: string
  rawHeaders: http.IncomingHttpHeaders
  body: Buffer
}

const HOP_BY_HOP_HEADERS = [
  'connection',
  'keep-alive',
  'proxy-connection',
  'proxy-authorization',
  'transfer-encoding',
  'upgrade'
]

const BODYLESS_STATUSES = new Set([204, 304])

function readBody(req: http.IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    req.on('data', (chunk: Buffer) => chunks.push(chunk))
    req.on('end', () => resolve(Buffer.concat(chunks)))
    req.on('error', reject)
  })
}

function defaultPort(scheme: Target['scheme']): number {
  return scheme === 'https' ? 443 : 80
}

function targetUrl(target: Target, path: string): string {
  const port = target.port === defaultPort(target.scheme) ? '' : `:${target.port}`
  return `${target.scheme}://${target.hostname}${port}${path}`
}

function parseConnectTarget(authority: string): Target | null {
  const match = /^\[?([^\]]+?)\]?(?::(\d+))?$/.exec(authority)
  if (!match) return null
  const port = match[2] ? parseInt(match[2], 10) : 443
  return { scheme: 'https', hostname: match[1], port }
}

/**
 * HTTP forward proxy that reports every exchange to the inspector and answers
 * with the response the inspector decides on. CONNECT tunnels are decrypted
 * with certificates minted by the local CA.
 */
export class ProxyAgent {
  readonly server: http.Server
  private readonly tunnelParser: http.Server
  private readonly tunnelTargets = new WeakMap<object, Target>()
  private readonly openSockets = new Set<Duplex>()
  private readonly logger: Logger

  constructor(private readonly options: ProxyAgentOptions) {
    this.logger = options.logger

    this.server = http.createServer((req, res) => this.handlePlain(req, res))
    this.server.on('connect', (req: http.IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleConnect(req, socket, head)
    })

    // Decrypted tunnel traffic is fed to this server, which never listens
    this.tunnelParser = http.createServer((req, res) => {
      const target = this.tunnelTargets.get(req.socket)
      if (!target) {
        res.writeHead(502, { 'content-type': 'text/plain' })
        res.end('Bad Gateway: unknown tunnel')
        return
      }
      this.dispatch(req, res, target, req.url || '/')
    })
  }

  async listen(port: number, host = '127.0.0.1'): Promise<number> {
    await new Promise<void>((resolve, reject) => {
      this.server.once('error', reject)
      this.server.listen(port, host, () => {
        this.server.off('error', reject)
        resolve()
      })
    })
    const address = this.server.address()
    const boundPort = isAddressInfo(address) ? address.port : port
    this.logger.info(`Proxy listening on http://${host}:${boundPort}`)
    return boundPort
  }

  close(): Promise<void> {
    for (const socket of this.openSockets) {
      socket.destroy()
    }
    this.openSockets.clear()

    if (!this.server.listening) return Promise.resolve()
    return new Promise((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()))
      this.server.closeAllConnections()
    })
  }

  private handlePlain(req: http.IncomingMessage, res: http.ServerResponse): void {
    const url = req.url || '/'

    if (url === '/ca.crt' && this.options.ca) {
      res.writeHead(200, { 'content-type': 'application/x-x509-ca-cert' })
      res.end(this.options.ca.caCertificatePem())
      return
    }

    if (!URL.canParse(url) || !url.startsWith('http://')) {
      res.writeHead(400, { 'content-type': 'text/plain' })
      res.end('Bad Request: expected an absolute http:// URL')
      return
    }

    const parsed = new URL(url)
    const target: Target = {
      scheme: 'http',
      hostname: parsed.hostname,
      port: parsed.port ? parseInt(parsed.port, 10) : 80
    }
    this.dispatch(req, res, target, parsed.pathname + parsed.search)
  }

  private handleConnect(req: http.IncomingMessage, clientSocket: Duplex, head: Buffer): void {
    const target = parseConnectTarget(req.url || '')
    if (!target) {
      clientSocket.end('HTTP/1.1 400 Bad Request\r\n\r\n')
      return
    }

    this.openSockets.add(clientSocket)
    clientSocket.on('close', () => this.openSockets.delete(clientSocket))
    clientSocket.on('error', (err) => {
      this.logger.debug(`[CONNECT] Client socket error for ${target.hostname}: ${err.message}`)
    })

    const ca = this.options.ca
    if (!ca) {
      this.relay(target, clientSocket, head)
      return
    }

    clientSocket.write('HTTP/1.1 200 Connection Established\r\n\r\n')
    if (head.length > 0) {
      clientSocket.unshift(head)
    }

    const tlsSocket = new tls.TLSSocket(clientSocket, {
      isServer: true,
      secureContext: ca.contextFor(target.hostname)
    })
    tlsSocket.on('error', (err) => {
      this.logger.warn(`[CONNECT] TLS error for ${target.hostname}: ${err.message}`)
      tlsSocket.destroy()
    })

    this.tunnelTargets.set(tlsSocket, target)
    this.tunnelParser.emit('connection', tlsSocket)
  }

  /**
   * Blind tunnel for when there is no CA to decrypt with
   */
  private relay(target: Target, clientSocket: Duplex, head: Buffer): void {
    const upstream = net.connect(target.port, target.hostname, () => {
      clientSocket.write('HTTP/1.1 200 Connection Established\r\n\r\n')
      if (head.length > 0) upstream.write(head)
      upstream.pipe(clientSocket)
      clientSocket.pipe(upstream)
    })
    upstream.on('error', (err) => {
      this.logger.warn(`[CONNECT] Upstream error for ${target.hostname}:${target.port}: ${err.message}`)
      clientSocket.end('HTTP/1.1 502 Bad Gateway\r\n\r\n')
    })
    clientSocket.on('close', () => upstream.destroy())
  }

  private dispatch(req: http.IncomingMessage, res: http.ServerResponse, target: Target, path: string): void {
    this.process(req, res, target, path).catch((err: unknown) => {
      this.logger.error(`Failed to proxy ${req.method} ${targetUrl(target, path)}: ${toErrorMessage(err)}`)
      if (!res.headersSent) {
        res.writeHead(502, { 'content-type': 'text/plain' })
        res.end(`Bad Gateway: ${toErrorMessage(err)}`)
      } else {
        res.destroy()
      }
    })
  }

  private async process(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    target: Target,
    path: string
  ): Promise<void> {
    const body = await readBody(req)
    const started = Date.now()
    const url = targetUrl(target, path)
    const method = req.method || 'GET'
    const requestHeaders = normalizeHeaders(req.headers)

    const request: RequestSnapshot = Object.freeze({
      method,
      url,
      host: requestHeaders.host || new URL(url).host,
      path,
      headers: Object.freeze(omitHeaders(requestHeaders, ['proxy-connection', 'proxy-authorization'])),
      body: body.toString('utf-8')
    })
    const base = { sourceFlowId: generateId(), transport: 'proxy', request, timestamp: started }

    const reachable = this.options.isReachable ? await this.options.isReachable() : true

    if (reachable && this.options.queryMockFirst) {
      const mock = await this.queryMock(request)
      if (mock) {
        this.logger.info(`Answering ${method} ${url} from mock "${mock.ruleName}"`)
        const mocked = synthesizeResponse({ statusCode: mock.statusCode, headers: mock.headers, body: mock.body })
        const decision = await awaitDecision(this.options.channel, {
          ...base,
          response: mocked,
          duration: Date.now() - started,
          mockApplied: true,
          mockRuleName: mock.ruleName,
          mockRuleId: mock.ruleId
        }, this.logger)
        this.writeEdited(res, method, url, applyModifications(mocked, decision?.modified), () => {
          this.writeSnapshot(res, method, mocked)
        })
        return
      }
    }

    let upstream: UpstreamResponse
    try {
      upstream = await this.forward(target, method, path, req.headers, body)
    } catch (err) {
      this.logger.warn(`Upstream request failed for ${method} ${url}: ${toErrorMessage(err)}`)
      res.writeHead(502, { 'content-type': 'text/plain' })
      res.end(`Bad Gateway: ${toErrorMessage(err)}`)
      return
    }

    if (!reachable) {
      this.writeUpstream(res, method, upstream)
      return
    }

    const encoding = firstHeader(upstream.rawHeaders['content-encoding'])
    const decoded = decompressBody(upstream.body, encoding, this.logger)
    const stale = ['content-length', ...HOP_BY_HOP_HEADERS]
    if (decoded && encoding) stale.push('content-encoding')

    const response: ResponseSnapshot = Object.freeze({
      statusCode: upstream.statusCode,
      reason: upstream.reason,
      headers: Object.freeze(omitHeaders(normalizeHeaders(upstream.rawHeaders), stale)),
      body: (decoded ?? upstream.body).toString('utf-8')
    })

    const submission: FlowSubmission = {
      ...base,
      response,
      duration: Date.now() - started,
      mockApplied: false,
      mockRuleName: null,
      mockRuleId: null
    }
    const decision = await awaitDecision(this.options.channel, submission, this.logger)

    if (!decision || isUnmodified(decision.modified)) {
      this.writeUpstream(res, method, upstream)
      return
    }
    // Without a body override the captured bytes go out, matching the headers kept above
    const keptBody = decision.modified?.body == null ? decoded ?? upstream.body : undefined
    this.writeEdited(res, method, url, applyModifications(response, decision.modified), () => {
      this.writeUpstream(res, method, upstream)
    }, keptBody)
  }

  private async queryMock(request: RequestSnapshot): Promise<MockDecision | null> {
    try {
      return await this.options.channel.queryMock(describeRequest(request))
    } catch (err) {
      this.logger.warn(`Mock lookup failed for ${request.url}: ${toErrorMessage(err)}`)
      return null
    }
  }

  private forward(
    target: Target,
    method: string,
    path: string,
    headers: http.IncomingHttpHeaders,
    body: Buffer
  ): Promise<UpstreamResponse> {
    const outgoing: http.OutgoingHttpHeaders = {}
    for (const [name, value] of Object.entries(headers)) {
      if (value === undefined || name === 'proxy-connection' || name === 'proxy-authorization') continue
      outgoing[name] = value
    }
    outgoing.host = target.port === defaultPort(target.scheme) ? target.hostname : `${target.hostname}:${target.port}`

    const options: https.RequestOptions = {
      hostname: target.hostname,
      port: target.port,
      path,
      method,
      headers: outgoing
    }
    if (target.scheme === 'https') {
      options.servername = net.isIP(target.hostname) ? undefined : target.hostname
      options.rejectUnauthorized = !this.options.upstreamInsecure
    }

    return new Promise((resolve, reject) => {
      const onResponse = (upstreamRes: http.IncomingMessage): void => {
        const chunks: Buffer[] = []
        upstreamRes.on('data', (chunk: Buffer) => chunks.push(chunk))
        upstreamRes.on('end', () => {
          resolve({
            statusCode: upstreamRes.statusCode || 502,
            reason: upstreamRes.statusMessage || '',
            rawHeaders: upstreamRes.headers,
            body: Buffer.concat(chunks)
          })
        })
        upstreamRes.on('error', reject)
      }

      const upstreamReq = target.scheme === 'https'
        ? https.request(options, onResponse)
        : http.request(options, onResponse)
      upstreamReq.on('error', reject)
      if (body.length > 0) {
        upstreamReq.write(body)
      }
      upstreamReq.end()
    })
  }

  /**
   * Relay the upstream answer byte for byte
   */
  private writeUpstream(res: http.ServerResponse, method: string, upstream: UpstreamResponse): void {
    const headers: http.OutgoingHttpHeaders = {}
    for (const [name, value] of Object.entries(upstream.rawHeaders)) {
      if (value === undefined || HOP_BY_HOP_HEADERS.includes(name)) continue
      headers[name] = value
    }
    const hasBody = method !== 'HEAD' && !BODYLESS_STATUSES.has(upstream.statusCode)
    if (hasBody) {
      headers['content-length'] = upstream.body.length
    }
    res.writeHead(upstream.statusCode, upstream.reason || undefined, headers)
    res.end(hasBody ? upstream.body : undefined)
  }

  /**
   * Write an operator-edited response; when Node refuses it (a bad header name
   * or reason) and nothing has been sent yet, `fallback` writes the original.
   */
  private writeEdited(
    res: http.ServerResponse,
    method: string,
    url: string,
    snapshot: ResponseSnapshot,
    fallback: () => void,
    body?: Buffer
  ): void {
    try {
      this.writeSnapshot(res, method, snapshot, body)
    } catch (err) {
      if (res.headersSent) throw err
      this.logger.warn(`Discarding edit for ${method} ${url}: ${toErrorMessage(err)}`)
      for (const name of res.getHeaderNames()) {
        res.removeHeader(name)
      }
      fallback()
    }
  }

  private writeSnapshot(res: http.ServerResponse, method: string, snapshot: ResponseSnapshot, body?: Buffer): void {
    const headers: http.OutgoingHttpHeaders = { ...omitHeaders(snapshot.headers, ['content-length', ...HOP_BY_HOP_HEADERS]) }
    const hasBody = method !== 'HEAD' && !BODYLESS_STATUSES.has(snapshot.statusCode)
    const payload = body ?? Buffer.from(snapshot.body, 'utf-8')
    if (hasBody) {
      headers['content-length'] = payload.length
    }
    res.writeHead(snapshot.statusCode, snapshot.reason || undefined, headers)
    res.end(hasBody ? payload : undefined)
  }
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === 'object' && address !== null
}

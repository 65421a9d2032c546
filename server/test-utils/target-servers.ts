/**
 * Upstream servers for proxy and interceptor tests
 */
import http from 'http'
import https from 'https'
import type { AddressInfo, Server } from 'net'
import forge from 'node-forge'
import { brotliCompressSync, deflateSync, gzipSync } from 'zlib'

export type Compression = 'none' | 'gzip' | 'deflate' | 'br'

export interface ReceivedRequest {
  method: string
  url: string
  headers: http.IncomingHttpHeaders
  body: string
}

export interface ServerHandle {
  port: number
  url: string
  requests: ReceivedRequest[]
  close(): Promise<void>
}

export function compress(data: string, encoding: Compression): Buffer {
  const buffer = Buffer.from(data, 'utf-8')
  switch (encoding) {
    case 'gzip':
      return gzipSync(buffer)
    case 'deflate':
      return deflateSync(buffer)
    case 'br':
      return brotliCompressSync(buffer)
    case 'none':
      return buffer
  }
}

/** Bytes that do not survive a round trip through UTF-8 text */
export const BINARY_PAYLOAD = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0xff, 0xfe, 0x00, 0x80])

/**
 * Endpoints:
 * - any other path answers `{"ok":true,"path":...}` with `x-upstream: yes`
 * - `/echo` answers with the method and body it received
 * - `/compressed?encoding=gzip` answers `compressed payload` encoded as asked
 * - `/empty` answers 204
 * - `/binary` answers `BINARY_PAYLOAD` as image/png
 */
function handle(req: http.IncomingMessage, res: http.ServerResponse, requests: ReceivedRequest[]): void {
  const chunks: Buffer[] = []
  req.on('data', (chunk: Buffer) => chunks.push(chunk))
  req.on('end', () => {
    const body = Buffer.concat(chunks).toString('utf-8')
    const url = new URL(req.url || '/', 'http://localhost')
    requests.push({ method: req.method || 'GET', url: req.url || '/', headers: req.headers, body })

    if (url.pathname === '/echo') {
      const payload = JSON.stringify({ method: req.method, body })
      res.writeHead(200, { 'content-type': 'application/json', 'content-length': Buffer.byteLength(payload) })
      res.end(payload)
      return
    }

    if (url.pathname === '/compressed') {
      const encoding = url.searchParams.get('encoding') || 'none'
      const compression: Compression = encoding === 'gzip' || encoding === 'deflate' || encoding === 'br' ? encoding : 'none'
      const payload = compress('compressed payload', compression)
      const headers: http.OutgoingHttpHeaders = { 'content-type': 'text/plain', 'content-length': payload.length }
      if (compression !== 'none') headers['content-encoding'] = compression
      res.writeHead(200, headers)
      res.end(payload)
      return
    }

    if (url.pathname === '/binary') {
      res.writeHead(200, { 'content-type': 'image/png', 'content-length': BINARY_PAYLOAD.length })
      res.end(BINARY_PAYLOAD)
      return
    }

    if (url.pathname === '/empty') {
      res.writeHead(204)
      res.end()
      return
    }

    const payload = JSON.stringify({ ok: true, path: url.pathname })
    res.writeHead(200, {
      'content-type': 'application/json',
      'content-length': Buffer.byteLength(payload),
      'x-upstream': 'yes'
    })
    res.end(payload)
  })
}

function selfSignedCertificate(commonName: string): { key: string; cert: string } {
  const keys = forge.pki.rsa.generateKeyPair(1024)
  const cert = forge.pki.createCertificate()

  cert.publicKey = keys.publicKey
  cert.serialNumber = '01'
  cert.validity.notBefore = new Date()
  cert.validity.notAfter = new Date()
  cert.validity.notAfter.setFullYear(cert.validity.notBefore.getFullYear() + 1)

  const attrs = [{ name: 'commonName', value: commonName }]
  cert.setSubject(attrs)
  cert.setIssuer(attrs)
  cert.setExtensions([{ name: 'subjectAltName', altNames: [{ type: 7, ip: commonName }] }])
  cert.sign(keys.privateKey, forge.md.sha256.create())

  return { key: forge.pki.privateKeyToPem(keys.privateKey), cert: forge.pki.certificateToPem(cert) }
}

type ClosableServer = Server & { closeAllConnections(): void }

async function listen(server: ClosableServer, requests: ReceivedRequest[], scheme: 'http' | 'https'): Promise<ServerHandle> {
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve))
  const address = server.address()
  const port = isAddressInfo(address) ? address.port : 0

  return {
    port,
    url: `${scheme}://127.0.0.1:${port}`,
    requests,
    close: () => new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()))
      server.closeAllConnections()
    })
  }
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === 'object' && address !== null
}

export function createHttpTargetServer(): Promise<ServerHandle> {
  const requests: ReceivedRequest[] = []
  return listen(http.createServer((req, res) => handle(req, res, requests)), requests, 'http')
}

/**
 * HTTPS variant with a throwaway self-signed certificate for 127.0.0.1
 */
export function createHttpsTargetServer(): Promise<ServerHandle> {
  const requests: ReceivedRequest[] = []
  const server = https.createServer(selfSignedCertificate('127.0.0.1'), (req, res) => handle(req, res, requests))
  return listen(server, requests, 'https')
}

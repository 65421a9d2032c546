import tls from 'tls'
import fs from 'fs'
import path from 'path'
import forge from 'node-forge'
import type { Logger } from '../shared/logger.js'

export interface CertificateAuthorityOptions {
  /** RSA modulus size for the CA and leaf keys */
  keyBits?: number
}

interface CaMaterial {
  cert: forge.pki.Certificate
  key: forge.pki.rsa.PrivateKey
}

/**
 * Local CA that mints a leaf certificate per intercepted host. The CA key pair
 * is kept in `certsDir` so devices only have to trust it once.
 */
export class CertificateAuthority {
  private material: CaMaterial | null = null
  private readonly contexts = new Map<string, tls.SecureContext>()
  private readonly keyBits: number

  constructor(
    readonly certsDir: string,
    private readonly logger: Logger,
    options: CertificateAuthorityOptions = {}
  ) {
    this.keyBits = options.keyBits ?? 2048
  }

  get certPath(): string {
    return path.join(this.certsDir, 'ca.crt')
  }

  get keyPath(): string {
    return path.join(this.certsDir, 'ca.key')
  }

  /**
   * PEM of the CA certificate, for installing on devices
   */
  caCertificatePem(): string {
    return forge.pki.certificateToPem(this.load().cert)
  }

  load(): CaMaterial {
    if (this.material) return this.material

    if (!fs.existsSync(this.certsDir)) {
      fs.mkdirSync(this.certsDir, { recursive: true })
    }

    if (fs.existsSync(this.certPath) && fs.existsSync(this.keyPath)) {
      const cert = forge.pki.certificateFromPem(fs.readFileSync(this.certPath, 'utf-8'))
      const key = forge.pki.privateKeyFromPem(fs.readFileSync(this.keyPath, 'utf-8'))
      this.material = { cert, key }
      this.logger.info(`Loaded CA certificate from ${this.certPath}`)
      return this.material
    }

    this.logger.info('Generating new CA certificate...')
    const keys = forge.pki.rsa.generateKeyPair(this.keyBits)
    const cert = forge.pki.createCertificate()

    cert.publicKey = keys.publicKey
    cert.serialNumber = '01'
    cert.validity.notBefore = new Date()
    cert.validity.notAfter = new Date()
    cert.validity.notAfter.setFullYear(cert.validity.notBefore.getFullYear() + 10)

    const attrs = [
      { name: 'commonName', value: 'Flow Inspector CA' },
      { name: 'organizationName', value: 'Flow Inspector' }
    ]
    cert.setSubject(attrs)
    cert.setIssuer(attrs)

    cert.setExtensions([
      { name: 'basicConstraints', cA: true },
      { name: 'keyUsage', keyCertSign: true, digitalSignature: true, cRLSign: true }
    ])

    cert.sign(keys.privateKey, forge.md.sha256.create())

    fs.writeFileSync(this.certPath, forge.pki.certificateToPem(cert))
    fs.writeFileSync(this.keyPath, forge.pki.privateKeyToPem(keys.privateKey))
    this.logger.info(`CA certificate saved to ${this.certPath}`)

    this.material = { cert, key: keys.privateKey }
    return this.material
  }

  /**
   * Secure context presenting a certificate for `host`, signed by this CA
   */
  contextFor(host: string): tls.SecureContext {
    const cached = this.contexts.get(host)
    if (cached) return cached

    const ca = this.load()
    const keys = forge.pki.rsa.generateKeyPair(this.keyBits)
    const cert = forge.pki.createCertificate()

    cert.publicKey = keys.publicKey
    cert.serialNumber = Date.now().toString(16)
    cert.validity.notBefore = new Date()
    cert.validity.notAfter = new Date()
    cert.validity.notAfter.setFullYear(cert.validity.notBefore.getFullYear() + 1)

    cert.setSubject([{ name: 'commonName', value: host }])
    cert.setIssuer(ca.cert.subject.attributes)

    // type 7 is an IP address, type 2 a DNS name
    const altName = isIpAddress(host) ? { type: 7, ip: host } : { type: 2, value: host }
    cert.setExtensions([
      { name: 'basicConstraints', cA: false },
      { name: 'keyUsage', digitalSignature: true, keyEncipherment: true },
      { name: 'extKeyUsage', serverAuth: true },
      { name: 'subjectAltName', altNames: [altName] }
    ])

    cert.sign(ca.key, forge.md.sha256.create())

    const context = tls.createSecureContext({
      key: forge.pki.privateKeyToPem(keys.privateKey),
      cert: forge.pki.certificateToPem(cert)
    })

    this.contexts.set(host, context)
    this.logger.debug(`Issued certificate for ${host}`)
    return context
  }
}

function isIpAddress(host: string): boolean {
  return /^\d{1,3}(\.\d{1,3}){3}$/.test(host) || host.includes(':')
}

import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import fs from 'fs'
import os from 'os'
import path from 'path'
import forge from 'node-forge'
import { silentLogger } from '../server/test-utils/index.js'
import { CertificateAuthority } from './ca.js'

describe('CertificateAuthority', () => {
  let dir: string

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'inspector-ca-'))
  })

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('generates a CA and stores it on disk', () => {
    const certsDir = path.join(dir, 'nested', 'certs')
    const ca = new CertificateAuthority(certsDir, silentLogger(), { keyBits: 1024 })

    const pem = ca.caCertificatePem()

    expect(fs.existsSync(ca.certPath)).toBe(true)
    expect(fs.existsSync(ca.keyPath)).toBe(true)
    const cert = forge.pki.certificateFromPem(pem)
    expect(cert.subject.getField('CN').value).toBe('Flow Inspector CA')
    expect(cert.getExtension('basicConstraints')).toMatchObject({ cA: true })
  })

  it('reuses the stored CA', () => {
    const certsDir = path.join(dir, 'reuse')
    const first = new CertificateAuthority(certsDir, silentLogger(), { keyBits: 1024 })
    const pem = first.caCertificatePem()

    const second = new CertificateAuthority(certsDir, silentLogger(), { keyBits: 1024 })

    expect(second.caCertificatePem()).toBe(pem)
  })

  it('caches one secure context per host', () => {
    const ca = new CertificateAuthority(path.join(dir, 'leaf'), silentLogger(), { keyBits: 1024 })

    const context = ca.contextFor('api.example.test')

    expect(ca.contextFor('api.example.test')).toBe(context)
    expect(ca.contextFor('127.0.0.1')).not.toBe(context)
  })
})

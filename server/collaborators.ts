/**
 * Contracts for the device-side pieces the inspector relies on but does not
 * implement: finding devices and apps, trusting the proxy CA on a device, and
 * steering an app's traffic through the proxy.
 */

import { toErrorMessage } from '../shared/errors.js'
import type { Logger } from '../shared/logger.js'

export type CertInstallOutcome = 'installed_automatically' | 'requires_manual_install' | 'failed'

export interface CertInstallResult {
  outcome: CertInstallOutcome
  /** Name of the strategy that produced the outcome */
  strategy?: string
  message?: string
}

export interface CertificateInstaller {
  install(deviceId: string): Promise<CertInstallResult>
}

export interface CertificateInstallStrategy {
  name: string
  install(deviceId: string): Promise<CertInstallOutcome>
}

export interface DeviceInfo {
  id: string
  name: string
  online: boolean
}

export interface AppInfo {
  packageName: string
  uid: number
  label?: string
}

export interface DeviceDiscovery {
  listDevices(): Promise<DeviceInfo[]>
  listApps(deviceId: string): Promise<AppInfo[]>
}

export interface TrafficRedirector {
  /** Route the app's traffic through the proxy listening on `proxyPort` */
  enable(deviceId: string, appUid: number, proxyPort: number): Promise<boolean>
  disable(deviceId: string, appUid: number): Promise<boolean>
}

/**
 * Try each strategy in order and stop at the first one that does not fail.
 * A strategy that throws counts as failed.
 */
export function createTieredInstaller(
  strategies: readonly CertificateInstallStrategy[],
  logger?: Logger
): CertificateInstaller {
  return {
    async install(deviceId) {
      const errors: string[] = []
      for (const strategy of strategies) {
        let outcome: CertInstallOutcome
        try {
          outcome = await strategy.install(deviceId)
        } catch (err) {
          errors.push(`${strategy.name}: ${toErrorMessage(err)}`)
          logger?.warn(`Certificate strategy ${strategy.name} threw on ${deviceId}: ${toErrorMessage(err)}`)
          continue
        }

        if (outcome !== 'failed') {
          logger?.info(`Certificate strategy ${strategy.name} on ${deviceId}: ${outcome}`)
          return { outcome, strategy: strategy.name }
        }
        errors.push(`${strategy.name}: failed`)
        logger?.debug(`Certificate strategy ${strategy.name} failed on ${deviceId}`)
      }

      return {
        outcome: 'failed',
        message: errors.length > 0 ? errors.join('; ') : 'No installation strategies configured'
      }
    }
  }
}

import type { ProviderDescriptor } from '../types/index.js'
import { ValidationError } from '../errors.js'

/**
 * URL schemes accepted for remote transports
 */
export const SUPPORTED_URL_SCHEMES = ['http://', 'https://'] as const

/**
 * Validation result (discriminated union)
 */
export type ValidationResult
  = | { valid: true }
    | { valid: false, error: ValidationError }

/**
 * Check a provider descriptor without touching the network or filesystem
 */
export function validateProvider(provider: ProviderDescriptor): ValidationResult {
  const { name, transport } = provider

  if (!name) {
    return invalid(name, 'Server name cannot be empty')
  }

  switch (transport.type) {
    case 'stdio':
      if (!transport.command) {
        return invalid(name, `Command cannot be empty for server: ${name}`)
      }
      break

    case 'http':
    case 'sse': {
      const url = transport.url
      if (!url) {
        return invalid(name, `URL cannot be empty for server: ${name}`)
      }
      if (!SUPPORTED_URL_SCHEMES.some(scheme => url.startsWith(scheme))) {
        return invalid(name, `Invalid URL format for server ${name}: ${url}`)
      }
      break
    }
  }

  return { valid: true }
}

function invalid(providerName: string, message: string): ValidationResult {
  return { valid: false, error: new ValidationError(providerName, message) }
}

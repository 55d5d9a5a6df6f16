/**
 * Tests for kube-secrets Error Hierarchy
 */

import { describe, it, expect } from 'vitest'
import {
  KubeSecretsError,
  ConfigError,
  MissingNamespaceError,
  UnknownContextError,
  InvalidKubeconfigError,
  ApiError,
  DataContractError,
  isKubeSecretsError,
  isConfigError,
  isApiError,
  isDataContractError,
  formatErrorForCli,
  wrapError
} from '../../src/lib/errors.js'

describe('KubeSecretsError (base class)', () => {
  it('should create error with message and code', () => {
    const error = new KubeSecretsError('test message', 'TEST_CODE')
    expect(error.message).toBe('test message')
    expect(error.code).toBe('TEST_CODE')
    expect(error.name).toBe('KubeSecretsError')
    expect(error instanceof Error).toBe(true)
  })

  it('should support cause', () => {
    const cause = new Error('original error')
    const error = new KubeSecretsError('wrapped', 'TEST', { cause })
    expect(error.cause).toBe(cause)
  })

  it('should format for CLI output', () => {
    const error = new KubeSecretsError('test message', 'TEST', { suggestion: 'try this' })
    expect(error.toCliOutput()).toBe('Error: test message\n  Suggestion: try this')
  })

  it('should convert to JSON', () => {
    const error = new KubeSecretsError('test', 'TEST', {
      suggestion: 'hint',
      context: { key: 'value' }
    })
    const json = error.toJSON()
    expect(json.name).toBe('KubeSecretsError')
    expect(json.code).toBe('TEST')
    expect(json.suggestion).toBe('hint')
    expect(json.context).toEqual({ key: 'value' })
  })
})

describe('ConfigError hierarchy', () => {
  it('MissingNamespaceError should carry the usage', () => {
    const error = new MissingNamespaceError()
    expect(error.code).toBe('MISSING_NAMESPACE')
    expect(error.message).toBe('Namespace is required')
    expect(error.suggestion).toBe('Usage: kube-secrets [-a] <namespace> [query]')
    expect(error instanceof ConfigError).toBe(true)
  })

  it('UnknownContextError should list available contexts', () => {
    const error = new UnknownContextError('prod', ['dev', 'staging'])
    expect(error.message).toBe('Context "prod" not found in kubeconfig')
    expect(error.suggestion).toBe('Available contexts: dev, staging')
    expect(error.context).toEqual({ contextName: 'prod', availableContexts: ['dev', 'staging'] })
  })

  it('UnknownContextError should handle a kubeconfig without contexts', () => {
    const error = new UnknownContextError('prod', [])
    expect(error.suggestion).toBe('The kubeconfig defines no contexts')
  })

  it('InvalidKubeconfigError should include the path', () => {
    const error = new InvalidKubeconfigError('ENOENT', '/tmp/missing')
    expect(error.message).toBe('Unable to load kubeconfig /tmp/missing: ENOENT')
    expect(error.code).toBe('INVALID_KUBECONFIG')
  })
})

describe('ApiError', () => {
  it('should describe a secrets failure with namespace and status', () => {
    const error = new ApiError('listSecrets', 'boom', { namespace: 'default', statusCode: 500 })
    expect(error.message).toBe("Failed to list secrets in namespace 'default' (HTTP 500): boom")
    expect(error.statusCode).toBe(500)
    expect(error.context).toEqual({ operation: 'listSecrets', namespace: 'default', statusCode: 500 })
  })

  it('should describe a namespaces failure without status', () => {
    const error = new ApiError('listNamespaces', 'connect ECONNREFUSED 127.0.0.1:6443')
    expect(error.message).toBe('Failed to list namespaces: connect ECONNREFUSED 127.0.0.1:6443')
    expect(error.statusCode).toBeUndefined()
  })
})

describe('DataContractError', () => {
  it('should name the resource and field', () => {
    const error = new DataContractError("Secret 'api-token'", 'type')
    expect(error.message).toBe('Secret \'api-token\' is missing required field "type"')
    expect(error.code).toBe('DATA_CONTRACT')
  })
})

describe('Type guards', () => {
  it('should classify errors', () => {
    expect(isKubeSecretsError(new MissingNamespaceError())).toBe(true)
    expect(isKubeSecretsError(new Error('plain'))).toBe(false)
    expect(isConfigError(new UnknownContextError('x', []))).toBe(true)
    expect(isConfigError(new ApiError('listSecrets', 'x'))).toBe(false)
    expect(isApiError(new ApiError('listSecrets', 'x'))).toBe(true)
    expect(isDataContractError(new DataContractError('Secret', 'type'))).toBe(true)
    expect(isDataContractError(new ApiError('listSecrets', 'x'))).toBe(false)
  })
})

describe('Helpers', () => {
  it('formatErrorForCli should handle every kind of value', () => {
    expect(formatErrorForCli(new MissingNamespaceError())).toBe(
      'Error: Namespace is required\n  Suggestion: Usage: kube-secrets [-a] <namespace> [query]'
    )
    expect(formatErrorForCli(new Error('plain'))).toBe('Error: plain')
    expect(formatErrorForCli('text')).toBe('Error: text')
  })

  it('wrapError should keep kube-secrets errors and wrap the rest', () => {
    const original = new DataContractError('Secret', 'type')
    expect(wrapError(original)).toBe(original)

    const cause = new Error('plain')
    const wrapped = wrapError(cause)
    expect(wrapped.code).toBe('UNKNOWN_ERROR')
    expect(wrapped.cause).toBe(cause)

    expect(wrapError(42, 'NUMBER').message).toBe('42')
  })
})

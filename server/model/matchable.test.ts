import { describe, it, expect } from 'vitest'
import { Double, Matchable, ProxyRule } from './matchable.js'
import { isMockspyError } from '../errors.js'

describe('Matchable', () => {
  it('assigns a distinct id to each instance', () => {
    const a = new Matchable('/test')
    const b = new Matchable('/test')

    expect(a.id).not.toBe(b.id)
    expect(a.id).toMatch(/^[a-z0-9]+$/)
  })

  it('keeps a provided id', () => {
    expect(new Matchable('/test', 'fixed-id').id).toBe('fixed-id')
  })

  it('tests the pattern as a regular expression', () => {
    const m = new Matchable('^/users/\\d+$')

    expect(m.matches('/users/12')).toBe(true)
    expect(m.matches('/users/abc')).toBe(false)
  })
})

describe('Double', () => {
  it('defaults to an empty 200 response', () => {
    const double = new Double('/test')

    expect(double.statusCode).toBe(200)
    expect(double.headers).toEqual({})
    expect(double.body).toBe('')
  })

  it('parses a JSON payload', () => {
    const double = Double.fromJson({
      pattern: '/users',
      status_code: 201,
      headers: { 'Content-Type': 'application/json' },
      body: '{"ok":true}'
    })

    expect(double.pattern).toBe('/users')
    expect(double.statusCode).toBe(201)
    expect(double.headers).toEqual({ 'Content-Type': 'application/json' })
    expect(double.body).toBe('{"ok":true}')
  })

  it('keeps its own copy of the headers it was given', () => {
    const headers: Record<string, string> = { 'X-Tag': 'original' }
    const double = new Double('/a', { headers })

    headers['X-Tag'] = 'changed'

    expect(double.headers).toEqual({ 'X-Tag': 'original' })
  })

  it('serializes back to the payload shape', () => {
    const double = new Double('/a', { statusCode: 418, headers: { 'X-Tag': ['a', 'b'] }, body: 'tea' }, 'd1')

    expect(double.toJson()).toEqual({
      id: 'd1',
      pattern: '/a',
      status_code: 418,
      headers: { 'X-Tag': 'a, b' },
      body: 'tea'
    })
  })

  it.each([
    [null, 'Expected a JSON object'],
    [{}, 'pattern must be a non-empty string'],
    [{ pattern: '(' }, 'pattern is not a valid regular expression: ('],
    [{ pattern: '/a', status_code: 99 }, 'status_code must be an integer between 100 and 599'],
    [{ pattern: '/a', body: 5 }, 'body must be a string'],
    [{ pattern: '/a', headers: { 'X-A': 1 } }, 'header X-A must be a string']
  ])('rejects invalid payload %j', (payload, message) => {
    let caught: unknown
    try {
      Double.fromJson(payload)
    } catch (err) {
      caught = err
    }

    expect(isMockspyError(caught, 'VALIDATION')).toBe(true)
    expect(caught).toHaveProperty('message', message)
  })
})

describe('ProxyRule', () => {
  it('parses a JSON payload', () => {
    const proxy = ProxyRule.fromJson({ pattern: '/api', redirect_url: 'http://localhost:8080/base/' })

    expect(proxy.redirectUrl).toBe('http://localhost:8080/base/')
    expect(proxy.targetUrl('/api/users?x=1')).toBe('http://localhost:8080/base/api/users?x=1')
  })

  it('requires an absolute redirect url', () => {
    expect(() => ProxyRule.fromJson({ pattern: '/api', redirect_url: 'not a url' }))
      .toThrow('redirect_url must be an absolute URL')
  })
})

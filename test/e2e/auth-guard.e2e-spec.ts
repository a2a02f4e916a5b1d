import { Test } from '@nestjs/testing'
import request from 'supertest'

import {
  ed25519KeyPair,
  jwkSetOf,
  nowSeconds,
  rsaKeyPair,
  signToken,
} from '../fixtures/test-keys'
import { stubHttpClient } from '../utils/http'

import { TestAppModule } from './test-app.module'

import type { HttpClient } from '../../src/http/http-client'
import type { INestApplication } from '@nestjs/common'

async function createApp(httpClient: HttpClient, redactServerErrors = true): Promise<INestApplication> {
  const moduleRef = await Test.createTestingModule({
    imports: [TestAppModule.withHttpClient(httpClient, redactServerErrors)],
  }).compile()
  const app = moduleRef.createNestApplication({ logger: false })
  await app.init()
  return app
}

describe('JwtAuthGuard (e2e)', () => {
  describe('with a reachable key set', () => {
    const http = stubHttpClient(jwkSetOf(rsaKeyPair, ed25519KeyPair))
    let app: INestApplication

    beforeAll(async () => {
      app = await createApp(http)
    })

    afterAll(async () => {
      await app.close()
    })

    it('serves a request carrying a valid token', async () => {
      const token = await signToken(rsaKeyPair, { sub: 'user-1', exp: nowSeconds() + 60 })

      const res = await request(app.getHttpServer())
        .get('/orders')
        .set('Authorization', `Bearer ${token}`)

      expect(res.status).toBe(200)
      expect(res.body).toEqual({ subject: 'user-1', orders: [] })
    })

    it('hands every verified claim to the handler', async () => {
      const exp = nowSeconds() + 60
      const token = await signToken(rsaKeyPair, { sub: 'user-1', exp, scope: 'orders:read' })

      const res = await request(app.getHttpServer())
        .get('/orders/me')
        .set('Authorization', `Bearer ${token}`)

      expect(res.status).toBe(200)
      expect(res.body).toEqual({ sub: 'user-1', exp, scope: 'orders:read' })
    })

    it('fetches the key set once across requests', async () => {
      const token = await signToken(rsaKeyPair, { sub: 'user-1', exp: nowSeconds() + 60 })
      const server = app.getHttpServer()

      await request(server).get('/orders').set('Authorization', `Bearer ${token}`)
      await request(server).get('/orders').set('Authorization', `Bearer ${token}`)

      expect(http.get).toHaveBeenCalledTimes(1)
    })

    it('answers 401 without a bearer token', async () => {
      const res = await request(app.getHttpServer()).get('/orders')

      expect(res.status).toBe(401)
      expect(res.body).toEqual({ error: 'Missing bearer token' })
    })

    it('answers 401 for a malformed token', async () => {
      const res = await request(app.getHttpServer())
        .get('/orders')
        .set('Authorization', 'Bearer garbage')

      expect(res.status).toBe(401)
      expect(res.body).toEqual({ error: 'Invalid token: invalid format' })
    })

    it('answers 401 for an unknown kid', async () => {
      const token = await signToken(
        rsaKeyPair,
        { sub: 'user-1', exp: nowSeconds() + 60 },
        { kid: 'k2' },
      )

      const res = await request(app.getHttpServer())
        .get('/orders')
        .set('Authorization', `Bearer ${token}`)

      expect(res.status).toBe(401)
      expect(res.body).toEqual({ error: 'Invalid token: no matching key for the given kid' })
    })

    it('answers 401 for an expired token', async () => {
      const token = await signToken(rsaKeyPair, { sub: 'user-1', exp: nowSeconds() - 3600 })

      const res = await request(app.getHttpServer())
        .get('/orders')
        .set('Authorization', `Bearer ${token}`)

      expect(res.status).toBe(401)
      expect(res.body).toEqual({ error: 'Invalid token: "exp" claim timestamp check failed' })
    })

    it('answers 500 for a key type it cannot use', async () => {
      const token = await signToken(ed25519KeyPair, { sub: 'user-1', exp: nowSeconds() + 60 })

      const res = await request(app.getHttpServer())
        .get('/orders')
        .set('Authorization', `Bearer ${token}`)

      expect(res.status).toBe(500)
      expect(res.body).toEqual({ error: 'Unsupported algorithm' })
    })

    it('leaves unguarded routes open', async () => {
      const res = await request(app.getHttpServer()).get('/health')

      expect(res.status).toBe(200)
      expect(res.body).toEqual({ status: 'ok' })
    })

    it('answers 500 when an unguarded route asks for claims', async () => {
      const res = await request(app.getHttpServer()).get('/health/whoami')

      expect(res.status).toBe(500)
      expect(res.body).toEqual({
        error: 'Verified claims are only available on routes protected by JwtAuthGuard',
      })
    })
  })

  describe('with an unreachable key set', () => {
    const http = stubHttpClient()
    let app: INestApplication

    beforeAll(async () => {
      http.get.mockRejectedValue(new Error('connection refused'))
      app = await createApp(http)
    })

    afterAll(async () => {
      await app.close()
    })

    it('answers 500 with the error kind only', async () => {
      const token = await signToken(rsaKeyPair, { sub: 'user-1', exp: nowSeconds() + 60 })

      const res = await request(app.getHttpServer())
        .get('/orders')
        .set('Authorization', `Bearer ${token}`)

      expect(res.status).toBe(500)
      expect(res.body).toEqual({ error: 'Missing credentials' })
    })

    it('retries the fetch on the next request', async () => {
      const token = await signToken(rsaKeyPair, { sub: 'user-1', exp: nowSeconds() + 60 })
      const calls = http.get.mock.calls.length

      await request(app.getHttpServer()).get('/orders').set('Authorization', `Bearer ${token}`)

      expect(http.get.mock.calls.length).toBe(calls + 1)
    })
  })

  describe('with redaction disabled', () => {
    it('includes the underlying reason of a 500', async () => {
      const http = stubHttpClient()
      http.get.mockRejectedValue(new Error('connection refused'))
      const app = await createApp(http, false)
      const token = await signToken(rsaKeyPair, { sub: 'user-1', exp: nowSeconds() + 60 })

      const res = await request(app.getHttpServer())
        .get('/orders')
        .set('Authorization', `Bearer ${token}`)
      await app.close()

      expect(res.status).toBe(500)
      expect(res.body).toEqual({ error: 'Missing credentials: connection refused' })
    })
  })
})

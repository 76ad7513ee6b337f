import { Test } from '@nestjs/testing'
import { NestExpressApplication } from '@nestjs/platform-express'
import request from 'supertest'
import { AppModule } from '../src/app.module'
import { configureApp } from '../src/app.setup'
import { loadConfig } from '../src/app.config'

describe('App (e2e)', () => {
  let app: NestExpressApplication

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({ imports: [AppModule] }).compile()
    app = moduleRef.createNestApplication<NestExpressApplication>({ logger: false })
    configureApp(app, loadConfig({ CORS_ORIGIN: 'http://frontend.test' }))
    await app.init()
  })

  afterAll(async () => {
    await app.close()
  })

  it('GET / redirects to the landing page', async () => {
    await request(app.getHttpServer()).get('/').expect(302).expect('Location', '/static/index.html')
  })

  it('GET /static/index.html serves html', async () => {
    const res = await request(app.getHttpServer()).get('/static/index.html').expect(200)
    expect(res.headers['content-type']).toMatch(/text\/html/)
    expect(res.text).toContain('<title>Mergington High School Activities</title>')
  })

  it('GET /health reports ok', async () => {
    const res = await request(app.getHttpServer()).get('/health').expect(200)
    expect(res.body.ok).toBe(true)
    expect(new Date(res.body.at).toISOString()).toBe(res.body.at)
  })

  it('allows the configured CORS origin', async () => {
    await request(app.getHttpServer())
      .get('/activities')
      .set('Origin', 'http://frontend.test')
      .expect(200)
      .expect('Access-Control-Allow-Origin', 'http://frontend.test')
  })
})

import 'reflect-metadata'
import 'dotenv/config'
import { Logger } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'
import { NestExpressApplication } from '@nestjs/platform-express'
import { AppModule } from './app.module'
import { loadConfig } from './app.config'
import { configureApp } from './app.setup'

const log = new Logger('Bootstrap')

async function bootstrap() {
  const config = loadConfig()
  const app = await NestFactory.create<NestExpressApplication>(AppModule)
  configureApp(app, config)

  await app.listen(config.port)
  log.log(`Activities API running on http://localhost:${config.port}`)
}

bootstrap().catch((e: unknown) => {
  log.error(e instanceof Error ? e.stack ?? e.message : String(e))
  process.exitCode = 1
})

import { NestExpressApplication } from '@nestjs/platform-express'
import { AppConfig } from './app.config'

// shared by main.ts and the e2e specs so both run the same HTTP stack
export function configureApp(app: NestExpressApplication, config: AppConfig): void {
  app.enableCors({
    origin: config.corsOrigin,
    credentials: true,
  })
  app.useStaticAssets(config.staticDir, { prefix: '/static' })
}

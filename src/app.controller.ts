import { Controller, Get, Redirect } from '@nestjs/common'

@Controller()
export class AppController {
  // landing page is served from the static assets
  @Get()
  @Redirect('/static/index.html', 302)
  root() {}

  @Get('health')
  health() {
    return { ok: true, at: new Date().toISOString() }
  }
}

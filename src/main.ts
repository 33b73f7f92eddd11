import 'reflect-metadata'
import { Logger } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'
import type { NestExpressApplication } from '@nestjs/platform-express'
import { AppModule } from './app.module'

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule)

  // raw tracks run to tens of thousands of points
  app.useBodyParser('json', { limit: process.env.BODY_LIMIT || '10mb' })

  app.enableCors({
    origin: process.env.CORS_ORIGIN || 'http://localhost:5173',
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  })

  const port = process.env.PORT ? Number(process.env.PORT) : 3000
  await app.listen(port)
  Logger.log(`Listening on port ${port}`, 'Bootstrap')
}

bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? err.stack ?? err.message : String(err), 'Bootstrap')
  process.exit(1)
})

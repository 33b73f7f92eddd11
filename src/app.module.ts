import { Module } from '@nestjs/common'
import { AppController } from './app.controller'
import { TrackAnalysisModule } from './track-analysis/track-analysis.module'

@Module({
  imports: [TrackAnalysisModule],
  controllers: [AppController],
})
export class AppModule {}

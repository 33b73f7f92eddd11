import { Module } from '@nestjs/common'
import { CLOCK, SystemClock } from '../utils/clock'
import { ANALYSIS_CONFIG } from './analysis.config'
import { loadAnalysisConfig } from './analysis-config.schema'
import { TrackAnalysisController } from './track-analysis.controller'
import { TrackAnalysisService } from './track-analysis.service'

@Module({
  controllers: [TrackAnalysisController],
  providers: [
    TrackAnalysisService,
    // read once at start-up, frozen afterwards
    { provide: ANALYSIS_CONFIG, useFactory: () => loadAnalysisConfig() },
    { provide: CLOCK, useClass: SystemClock },
  ],
  exports: [TrackAnalysisService],
})
export class TrackAnalysisModule {}

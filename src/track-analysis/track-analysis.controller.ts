import { Body, Controller, Get, HttpCode, Post, UsePipes, ValidationPipe } from '@nestjs/common'
import { AnalyzeTrackDto } from './dto/analyze-track.dto'
import { TrackAnalysisService } from './track-analysis.service'

@Controller('track-analysis')
export class TrackAnalysisController {
  constructor(private readonly trackAnalysisService: TrackAnalysisService) {}

  @Post()
  @HttpCode(200)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
  analyze(@Body() dto: AnalyzeTrackDto) {
    return this.trackAnalysisService.analyze(dto.points, dto.profiles, dto.strategy)
  }

  @Get('config')
  getConfig() {
    return this.trackAnalysisService.getConfig()
  }
}

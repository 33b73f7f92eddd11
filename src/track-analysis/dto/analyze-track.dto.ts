import { Type } from 'class-transformer'
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsIn,
  IsISO8601,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Matches,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator'
import {
  ARCHETYPES,
  WAYPOINT_TYPES,
  type Archetype,
  type RaceWaypoint,
  type RunnerProfile,
  type StrategyRequest,
  type WaypointType,
} from '../../types/analysis.types'
import type { RawTrackPoint } from '../../types/track.types'

const finite = { allowNaN: false, allowInfinity: false }

export class RawTrackPointDto implements RawTrackPoint {
  @IsNumber(finite)
  lat!: number

  @IsNumber(finite)
  lon!: number

  @IsOptional()
  @IsNumber(finite)
  elevation?: number | null

  @IsOptional()
  @IsISO8601()
  timestamp?: string | null
}

export class RunnerProfileDto implements RunnerProfile {
  @IsOptional()
  @IsNumber(finite)
  fitnessIndex?: number | null

  @IsOptional()
  @IsIn(ARCHETYPES)
  archetype?: Archetype | null
}

export class RaceWaypointDto implements RaceWaypoint {
  @IsNumber(finite)
  @Min(0)
  km!: number

  @IsOptional()
  @IsString()
  @MaxLength(80)
  name?: string | null

  @IsOptional()
  @IsIn(WAYPOINT_TYPES)
  type?: WaypointType | null
}

export class StrategyRequestDto implements StrategyRequest {
  @IsNumber(finite)
  @IsPositive()
  targetTimeSec!: number

  @IsOptional()
  @IsArray()
  @ArrayMaxSize(100)
  @ValidateNested({ each: true })
  @Type(() => RaceWaypointDto)
  waypoints?: RaceWaypointDto[] | null

  @IsOptional()
  @Matches(/^([01]\d|2[0-3]):[0-5]\d$/)
  startTime?: string | null

  @IsOptional()
  @IsNumber(finite)
  @IsPositive()
  fatigueDrift?: number | null
}

export class AnalyzeTrackDto {
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(200_000)
  @ValidateNested({ each: true })
  @Type(() => RawTrackPointDto)
  points!: RawTrackPointDto[]

  @IsOptional()
  @IsArray()
  @ArrayMaxSize(20)
  @ValidateNested({ each: true })
  @Type(() => RunnerProfileDto)
  profiles?: RunnerProfileDto[]

  @IsOptional()
  @ValidateNested()
  @Type(() => StrategyRequestDto)
  strategy?: StrategyRequestDto
}

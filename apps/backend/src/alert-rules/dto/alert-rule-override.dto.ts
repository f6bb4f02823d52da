import { IsBoolean, IsNumber, IsOptional } from 'class-validator';

export class AlertRuleOverrideDto {
  @IsOptional()
  @IsBoolean()
  enabled?: boolean;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  threshold?: number;
}

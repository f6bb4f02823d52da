import { Transform } from 'class-transformer';
import { IsBoolean, IsOptional } from 'class-validator';

export class ForgetNodeQueryDto {
  @IsOptional()
  @Transform(({ value }) => value === true || value === 'true' || value === '1')
  @IsBoolean()
  deleteLogs?: boolean;
}

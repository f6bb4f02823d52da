import { IsBoolean, IsOptional, IsString, Matches, MaxLength, MinLength } from 'class-validator';

export class SendMessageDto {
  /** `^all` for a bulletin, otherwise a node id such as `!a1b2c3d4`. */
  @IsString()
  @Matches(/^(\^all|![0-9a-fA-F]{8})$/)
  destination!: string;

  @IsString()
  @MinLength(1)
  @MaxLength(200)
  text!: string;

  @IsOptional()
  @IsBoolean()
  wantAck?: boolean;
}

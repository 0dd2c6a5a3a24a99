import { IsInt, IsOptional, Min } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class VerifyCertificatesDto {
  @ApiProperty({ description: 'Limit verification to one certificate. Omit to verify all.', required: false })
  @IsOptional()
  @IsInt()
  @Min(1)
  certificateId?: number;
}

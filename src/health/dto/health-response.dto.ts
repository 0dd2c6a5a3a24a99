import { ApiProperty } from '@nestjs/swagger';

/**
 * Response for GET /health endpoint
 * Contains health status of the application and its dependencies
 */
export class HealthResponseDto {
  @ApiProperty({
    description: 'Overall health status',
    example: 'ok',
    enum: ['ok', 'error'],
  })
  status!: string;

  @ApiProperty({
    description: 'Detailed information about each health indicator when healthy',
    example: {
      server: { status: 'up' },
      certificate: { status: 'up', domains: 1, uncovered: [], alarms: [] },
    },
    required: false,
  })
  info?: Record<string, unknown>;

  @ApiProperty({
    description: 'Error information if health check failed',
    example: {
      certificate: { status: 'down', domains: 2, uncovered: ['mail.example.com'], alarms: ['mail/mail.example.com'] },
    },
    required: false,
  })
  error?: Record<string, unknown>;

  @ApiProperty({
    description: 'Detailed health check results for all indicators',
    example: {
      server: { status: 'up' },
      certificate: { status: 'up', domains: 1, uncovered: [], alarms: [] },
    },
  })
  details!: Record<string, unknown>;
}

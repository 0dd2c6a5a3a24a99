import { ServiceUnavailableException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { HealthIndicatorService, TerminusModule } from '@nestjs/terminus';
import { HealthController } from '../health.controller';
import { CertificateHealthIndicator } from '../../certificate/certificate.health';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';

describe('HealthController', () => {
  let controller: HealthController;
  let isHealthy: jest.Mock;
  let restoreLogger: () => void;

  beforeEach(async () => {
    restoreLogger = silenceNestLogger();
    const indicators = new HealthIndicatorService();
    isHealthy = jest.fn((key: string) => indicators.check(key).up({ domains: 1, uncovered: [], alarms: [] }));

    const module: TestingModule = await Test.createTestingModule({
      imports: [TerminusModule],
      controllers: [HealthController],
      providers: [
        {
          provide: CertificateHealthIndicator,
          useValue: { isHealthy },
        },
      ],
    }).compile();

    controller = module.get<HealthController>(HealthController);
  });

  afterEach(() => {
    restoreLogger();
  });

  it('should be defined', () => {
    expect(controller).toBeDefined();
  });

  it('should report server and certificate health', async () => {
    const result = await controller.check();

    expect(isHealthy).toHaveBeenCalledWith('certificate');
    expect(result.status).toBe('ok');
    expect(result.info).toEqual({
      server: { status: 'up' },
      certificate: { status: 'up', domains: 1, uncovered: [], alarms: [] },
    });
  });

  it('should answer 503 when certificate coverage is down', async () => {
    const indicators = new HealthIndicatorService();
    isHealthy.mockImplementation((key: string) =>
      indicators.check(key).down({ domains: 1, uncovered: ['test.local'], alarms: [] }),
    );

    await expect(controller.check()).rejects.toThrow(ServiceUnavailableException);
  });
});

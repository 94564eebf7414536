import { Test } from '@nestjs/testing';
import { RenewalController } from '../renewal.controller';
import { RenewalSchedulerService } from '../renewal-scheduler.service';
import { ApiKeyGuard } from '../../shared/guards/api-key.guard';

describe('RenewalController', () => {
  it('should request a renewal', async () => {
    const renewalScheduler = { requestRenewal: jest.fn() };
    const module = await Test.createTestingModule({
      controllers: [RenewalController],
      providers: [{ provide: RenewalSchedulerService, useValue: renewalScheduler }],
    })
      .overrideGuard(ApiKeyGuard)
      .useValue({ canActivate: () => true })
      .compile();

    const controller = module.get(RenewalController);

    expect(controller.requestRenewal()).toEqual({ message: 'Renewal requested' });
    expect(renewalScheduler.requestRenewal).toHaveBeenCalledTimes(1);
  });
});

import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { CertificateController } from '../certificate.controller';
import { CertificateInventoryService } from '../storage/certificate-inventory.service';
import { RequestStoreService } from '../../state/request-store.service';
import { ApiKeyGuard } from '../../shared/guards/api-key.guard';
import { LIFECYCLE_EVENT } from '../../lifecycle/lifecycle.events';
import type { CertificateRequest } from '../../state/interfaces';

describe('CertificateController', () => {
  let controller: CertificateController;
  let requestStore: { append: jest.Mock; pendingRequests: jest.Mock };
  let inventory: { list: jest.Mock };
  let eventEmitter: { emit: jest.Mock };

  const storedRequest: CertificateRequest = {
    id: 'r1',
    fqdns: ['x.example.com'],
    source: 'api',
    createdAt: '2025-01-01T00:00:00.000Z',
  };

  beforeEach(async () => {
    requestStore = {
      append: jest.fn().mockReturnValue(storedRequest),
      pendingRequests: jest.fn().mockReturnValue([storedRequest]),
    };
    inventory = { list: jest.fn().mockResolvedValue([]) };
    eventEmitter = { emit: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [CertificateController],
      providers: [
        { provide: RequestStoreService, useValue: requestStore },
        { provide: CertificateInventoryService, useValue: inventory },
        { provide: EventEmitter2, useValue: eventEmitter },
      ],
    })
      .overrideGuard(ApiKeyGuard)
      .useValue({ canActivate: () => true })
      .compile();

    controller = module.get(CertificateController);
  });

  describe('requestCertificate', () => {
    it('should queue the request and wake the lifecycle', () => {
      const result = controller.requestCertificate({ fqdns: ['x.example.com'], contactEmail: '' });

      expect(requestStore.append).toHaveBeenCalledWith(['x.example.com'], '', 'api');
      expect(eventEmitter.emit).toHaveBeenCalledWith(LIFECYCLE_EVENT, 'certificate-requested');
      expect(result).toEqual(storedRequest);
    });

    it('should turn a rejected request into a 400', () => {
      requestStore.append.mockImplementation(() => {
        throw new Error('Duplicate domain names in certificate request: a.example.com, a.example.com');
      });

      expect(() => controller.requestCertificate({ fqdns: ['a.example.com', 'A.example.com'] })).toThrow(
        BadRequestException,
      );
      expect(eventEmitter.emit).not.toHaveBeenCalled();
    });
  });

  it('should list pending requests', () => {
    expect(controller.listRequests()).toEqual([storedRequest]);
  });

  it('should list issued certificates with ISO dates', async () => {
    inventory.list.mockResolvedValue([
      {
        name: 'x.example.com',
        domains: ['x.example.com'],
        issuedAt: new Date('2025-01-01T00:00:00.000Z'),
        expiresAt: new Date('2025-04-01T00:00:00.000Z'),
        daysUntilExpiry: 12,
      },
    ]);

    await expect(controller.listCertificates()).resolves.toEqual([
      {
        name: 'x.example.com',
        domains: ['x.example.com'],
        issuedAt: '2025-01-01T00:00:00.000Z',
        expiresAt: '2025-04-01T00:00:00.000Z',
        daysUntilExpiry: 12,
      },
    ]);
  });
});

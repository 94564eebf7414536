import { Test } from '@nestjs/testing';
import { HostPortsService, parsePortList } from '../host-ports.service';
import { CommandRunnerService } from '../../shared/command-runner.service';
import { StateStoreService, createInitialState } from '../../state/state-store.service';
import type { StewardState } from '../../state/interfaces';
import { HOST_CONFIG } from '../host.tokens';
import type { HostConfig } from '../interfaces';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';

describe('parsePortList', () => {
  it('should keep only port entries', () => {
    expect(parsePortList('80/tcp 443/tcp\n8080/udp, ssh 22')).toEqual(['80/tcp', '443/tcp', '8080/udp']);
  });

  it('should return an empty list for empty output', () => {
    expect(parsePortList('')).toEqual([]);
  });
});

describe('HostPortsService', () => {
  const restoreLogger = silenceNestLogger();
  let state: StewardState;
  let commandRunner: { run: jest.Mock };

  const createService = async (overrides: Partial<HostConfig> = {}) => {
    const config: HostConfig = {
      portsListCommand: [],
      portOpenCommand: [],
      platformId: 'ubuntu',
      minPlatformVersion: '16.04',
      osReleasePath: '/etc/os-release',
      ...overrides,
    };

    const module = await Test.createTestingModule({
      providers: [
        HostPortsService,
        { provide: HOST_CONFIG, useValue: config },
        { provide: CommandRunnerService, useValue: commandRunner },
        {
          provide: StateStoreService,
          useValue: {
            snapshot: jest.fn(() => structuredClone(state)),
            update: jest.fn((mutate: (draft: StewardState) => void) => {
              mutate(state);
              return structuredClone(state);
            }),
          },
        },
      ],
    }).compile();

    return module.get(HostPortsService);
  };

  beforeEach(() => {
    state = createInitialState();
    commandRunner = { run: jest.fn().mockResolvedValue({ exitCode: 0, output: '' }) };
  });

  afterAll(() => restoreLogger());

  describe('without commands', () => {
    it('should track opened ports in the state record', async () => {
      const service = await createService();

      await service.open(80);
      await service.open(80);
      await service.open(443);

      await expect(service.listOpenedPorts()).resolves.toEqual(['80/tcp', '443/tcp']);
      expect(commandRunner.run).not.toHaveBeenCalled();
    });
  });

  describe('with commands', () => {
    it('should list ports through the configured command', async () => {
      commandRunner.run.mockResolvedValue({ exitCode: 0, output: '80/tcp\n443/tcp\n' });
      const service = await createService({ portsListCommand: ['opened-ports'] });

      await expect(service.listOpenedPorts()).resolves.toEqual(['80/tcp', '443/tcp']);
      expect(commandRunner.run).toHaveBeenCalledWith('opened-ports', []);
    });

    it('should open ports through the configured command', async () => {
      const service = await createService({ portOpenCommand: ['open-port'] });

      await service.open(443);

      expect(commandRunner.run).toHaveBeenCalledWith('open-port', ['443/tcp']);
      expect(state.openedPorts).toEqual([]);
    });

    it('should throw when a command fails', async () => {
      commandRunner.run.mockResolvedValue({ exitCode: 1, output: 'denied\n' });
      const service = await createService({ portsListCommand: ['opened-ports'], portOpenCommand: ['open-port'] });

      await expect(service.listOpenedPorts()).rejects.toThrow('Listing opened ports failed with code 1: denied');
      await expect(service.open(80)).rejects.toThrow('Opening port 80/tcp failed with code 1: denied');
    });
  });
});

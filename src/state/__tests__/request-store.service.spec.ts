import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { RequestStoreService } from '../request-store.service';
import { StateStoreService } from '../state-store.service';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';

describe('RequestStoreService', () => {
  const restoreLogger = silenceNestLogger();
  let dataPath: string;
  let stateStore: StateStoreService;
  let requestStore: RequestStoreService;

  beforeEach(() => {
    dataPath = mkdtempSync(join(tmpdir(), 'steward-requests-'));
    stateStore = new StateStoreService({ dataPath });
    requestStore = new RequestStoreService(stateStore);
  });

  afterEach(() => {
    rmSync(dataPath, { recursive: true, force: true });
  });

  afterAll(() => restoreLogger());

  it('should queue requests in order with normalized names', () => {
    const first = requestStore.append([' A.Example.com '], 'admin@example.com', 'api');
    const second = requestStore.append(['b.example.com', 'www.b.example.com'], '', 'api');

    expect(requestStore.pendingRequests()).toEqual([first, second]);
    expect(first.fqdns).toEqual(['a.example.com']);
    expect(second.contactEmail).toBeUndefined();
    expect(first.id).not.toBe(second.id);
  });

  it('should keep duplicates across requests', () => {
    requestStore.append(['a.example.com'], undefined, 'api');
    requestStore.appendFromConfig('a.example.com', '');

    expect(requestStore.pendingRequests().map((request) => request.source)).toEqual(['api', 'config']);
  });

  it('should reject empty and duplicate names within a request', () => {
    expect(() => requestStore.append([], undefined, 'api')).toThrow('at least one domain name');
    expect(() => requestStore.append(['  '], undefined, 'api')).toThrow('at least one domain name');
    expect(() => requestStore.append(['a.example.com', 'A.example.com'], undefined, 'api')).toThrow(
      'Duplicate domain names in certificate request: a.example.com, a.example.com',
    );
    expect(requestStore.pendingRequests()).toEqual([]);
  });

  it('should consume a request by id', () => {
    const first = requestStore.append(['a.example.com'], undefined, 'api');
    const second = requestStore.append(['b.example.com'], undefined, 'api');

    requestStore.consume(first.id);

    expect(requestStore.pendingRequests()).toEqual([second]);
  });

  it('should survive a restart', () => {
    const request = requestStore.append(['a.example.com'], undefined, 'api');
    requestStore.setRegistered(true);

    const reloaded = new RequestStoreService(new StateStoreService({ dataPath }));

    expect(reloaded.pendingRequests()).toEqual([request]);
    expect(reloaded.isRegistered()).toBe(true);
  });
});

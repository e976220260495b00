/**
 * Scraper Socket Tests
 * Status relay against a recording stand-in for the socket.io server
 */

import { JobManager } from '../job.manager';
import { bindJobStatusBroadcast, jobRoom, StatusRelayTarget } from '../scraper.socket';
import { IJobStatusEvent } from '../scraper.types';
import { MemoryResultStore } from '../../../__tests__/helpers/fakes';
import { TEST_URL } from '../../../__tests__/helpers/fixtures';

type Delivery = [target: string, jobId: string, state: string];

function recordingServer(deliveries: Delivery[]): StatusRelayTarget {
  const emitterFor = (target: string) => ({
    emit: (_event: 'scrape:status', payload: IJobStatusEvent) => deliveries.push([target, payload.jobId, payload.state]),
  });
  return {
    except: (room) => emitterFor(`all except ${room}`),
    to: (room) => emitterFor(room),
  };
}

describe('bindJobStatusBroadcast', () => {
  let manager: JobManager;

  beforeEach(() => {
    manager = new JobManager(new MemoryResultStore(), { maxQueueSize: 10, retentionMax: 100, retentionTtlMs: 60_000 });
  });

  afterEach(() => {
    manager.close();
  });

  it('should deliver each state change once to the room and once to everyone else', () => {
    const deliveries: Delivery[] = [];
    bindJobStatusBroadcast(manager, recordingServer(deliveries));

    const jobId = manager.submit({ url: TEST_URL });

    expect(deliveries).toEqual([
      [`all except ${jobRoom(jobId)}`, jobId, 'queued'],
      [jobRoom(jobId), jobId, 'queued'],
    ]);
  });

  it('should stop relaying once detached', () => {
    const deliveries: Delivery[] = [];
    const detach = bindJobStatusBroadcast(manager, recordingServer(deliveries));

    detach();
    manager.submit({ url: TEST_URL });

    expect(deliveries).toEqual([]);
  });
});

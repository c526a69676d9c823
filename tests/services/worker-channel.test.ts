import { describe, it, expect } from 'vitest';
import { ErrorCode } from '../../src/errors/index.js';
import { ModelSummarySchema, RunPowerFlowResultSchema } from '../../src/schemas/worker.js';
import { WorkerChannel } from '../../src/services/worker-channel.js';
import { FakeWorker } from '../helpers/fake-worker.js';

describe('WorkerChannel', () => {
  it('sends one request line and resolves with the validated reply', async () => {
    const worker = new FakeWorker();
    const channel = new WorkerChannel(worker, 1000);

    const pending = channel.request('run_power_flow', { tol: 0.001 }, RunPowerFlowResultSchema);
    const request = await worker.nextRequest();
    worker.reply(request.id, { converged: true });

    expect(request).toEqual({ id: 1, method: 'run_power_flow', params: { tol: 0.001 } });
    expect(await pending).toBe(true);
  });

  it('matches replies to requests by id', async () => {
    const worker = new FakeWorker();
    const channel = new WorkerChannel(worker, 1000);

    const first = channel.request('run_power_flow', {}, RunPowerFlowResultSchema);
    const second = channel.request('run_power_flow', {}, RunPowerFlowResultSchema);
    const a = await worker.nextRequest();
    const b = await worker.nextRequest();
    worker.reply(b.id, { converged: false });
    worker.reply(a.id, { converged: true });

    expect(await first).toBe(true);
    expect(await second).toBe(false);
  });

  it('ignores output lines that are not protocol replies', async () => {
    const worker = new FakeWorker();
    const channel = new WorkerChannel(worker, 1000);

    const pending = channel.request('run_power_flow', {}, RunPowerFlowResultSchema);
    const request = await worker.nextRequest();
    worker.writeRaw('Loading case file...');
    worker.writeRaw('{"unexpected": true}');
    worker.reply(request.id, { converged: true });

    expect(await pending).toBe(true);
  });

  it('rejects with an engine failure when the worker reports an error', async () => {
    const worker = new FakeWorker();
    const channel = new WorkerChannel(worker, 1000);

    const pending = channel.request('run_power_flow', {}, RunPowerFlowResultSchema);
    const request = await worker.nextRequest();
    worker.replyError(request.id, 'singular Jacobian');

    await expect(pending).rejects.toMatchObject({
      code: ErrorCode.ENGINE_CALL_FAILED,
      message: 'Error running run_power_flow: singular Jacobian'
    });
  });

  it('rejects replies that do not match the schema', async () => {
    const worker = new FakeWorker();
    const channel = new WorkerChannel(worker, 1000);

    const pending = channel.request('summary', {}, ModelSummarySchema);
    const request = await worker.nextRequest();
    worker.reply(request.id, { name: 42 });

    await expect(pending).rejects.toMatchObject({ code: ErrorCode.WORKER_PROTOCOL_ERROR });
  });

  it('times out and kills a worker that does not answer', async () => {
    const worker = new FakeWorker();
    const channel = new WorkerChannel(worker, 20);

    const pending = channel.request('summary', {}, ModelSummarySchema);

    await expect(pending).rejects.toMatchObject({
      code: ErrorCode.WORKER_TIMEOUT,
      message: 'Engine worker did not answer "summary" within 20ms'
    });
    expect(worker.killCount).toBe(1);
    expect(channel.isAlive).toBe(false);
  });

  it('rejects pending and later requests once the worker exits', async () => {
    const worker = new FakeWorker();
    const channel = new WorkerChannel(worker, 1000);

    const pending = channel.request('summary', {}, ModelSummarySchema);
    await worker.nextRequest();
    worker.exit(1);

    await expect(pending).rejects.toMatchObject({
      code: ErrorCode.ENGINE_CALL_FAILED,
      message: 'Error running summary: engine worker exited (code 1)'
    });
    await expect(channel.request('summary', {}, ModelSummarySchema)).rejects.toMatchObject({
      message: 'Error running summary: engine worker has exited (code 1)'
    });
  });

  it('asks the worker to shut down on close', async () => {
    const worker = new FakeWorker();
    const channel = new WorkerChannel(worker, 1000);

    await channel.close(1000);

    expect(worker.requests.map(request => request.method)).toEqual(['shutdown']);
    expect(worker.killCount).toBe(0);
    expect(channel.isAlive).toBe(false);
  });

  it('kills a worker that ignores shutdown', async () => {
    const worker = new FakeWorker();
    worker.exitOnShutdown = false;
    const channel = new WorkerChannel(worker, 1000);

    await channel.close(20);

    expect(worker.killCount).toBe(1);
    expect(worker.exited).toBe(true);
  });
});

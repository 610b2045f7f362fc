import {describe, it, expect, beforeEach} from 'vitest';
import {TrackerRunner, TrackerSink, trackingResponse} from './trackerRunner';
import {TaskTracker, TrackingStatus} from './types';
import {TrackedTask} from '../types/task_message';
import {ResponseMessage} from '../types/response_message';
import {PublishOutcome} from '../rabbitmq/publisher';
import {FakeQueueChannel} from '../../test/support/fakes';
import {RecordingDeadLetters, trackedTask} from '../../test/support/builders';

const QUEUE = 'openproject.sent.queue';

class ScriptedTracker implements TaskTracker {
    readonly system = 'openproject';
    statuses = new Map<string, TrackingStatus | Error>();
    cleanups = 0;

    sourceQueueName(): string {
        return QUEUE;
    }

    async checkStatus(task: TrackedTask): Promise<TrackingStatus> {
        const status: TrackingStatus | Error = this.statuses.get(task.external_id) ?? {state: 'pending'};
        if (status instanceof Error) throw status;
        return status;
    }

    async cleanup(): Promise<void> {
        this.cleanups++;
    }
}

class ScriptedSink extends RecordingDeadLetters implements TrackerSink {
    readonly responses: ResponseMessage[] = [];
    outcome: PublishOutcome = {delivered: true, deadLettered: false, attempts: 1};

    async publishResponse(response: ResponseMessage): Promise<PublishOutcome> {
        this.responses.push(response);
        return this.outcome;
    }
}

describe('trackingResponse', () => {
    const task = trackedTask({system: 'openproject', external_id: 'wp-1'});

    it('completes with the external id ahead of the variables', () => {
        expect(trackingResponse(task, {state: 'completed', variables: {hours: 3}})).toEqual({
            task_id: 't-1',
            process_instance_id: 'pi-1',
            worker_id: 'task-bridge',
            source_queue: 'openproject.sent.queue',
            status: 'complete',
            variables: {external_id: 'wp-1', hours: 3}
        });
    });

    it('carries failure and BPMN error details', () => {
        expect(trackingResponse(task, {state: 'failed', errorMessage: 'rejected', retries: 1})).toMatchObject({
            status: 'failure',
            variables: {},
            error_message: 'rejected',
            retries: 1
        });
        expect(trackingResponse(task, {state: 'bpmn_error', errorCode: 'CANCELLED'})).toMatchObject({
            status: 'bpmn_error',
            variables: {},
            error_code: 'CANCELLED'
        });
    });
});

describe('TrackerRunner', () => {
    let channel: FakeQueueChannel;
    let tracker: ScriptedTracker;
    let sink: ScriptedSink;
    let runner: TrackerRunner;

    beforeEach(() => {
        channel = new FakeQueueChannel();
        tracker = new ScriptedTracker();
        sink = new ScriptedSink();
        runner = new TrackerRunner(channel, tracker, sink, 60000);
    });

    it('resolves finished tasks and keeps pending ones parked', async () => {
        channel.push(QUEUE, trackedTask({task_id: 't-1', external_id: 'wp-1'}));
        channel.push(QUEUE, trackedTask({task_id: 't-2', external_id: 'wp-2'}));
        tracker.statuses.set('wp-1', {state: 'completed', variables: {}});

        const report = await runner.runCycle();

        expect(report).toEqual({checked: 2, resolved: 1, pending: 1, errors: 0, malformed: 0});
        expect(sink.responses.map(response => response.task_id)).toEqual(['t-1']);
        expect(channel.depth(QUEUE)).toBe(1);
        expect(channel.bodies(QUEUE)).toEqual([expect.objectContaining({task_id: 't-2'})]);
    });

    it('requeues a task whose status check failed', async () => {
        channel.push(QUEUE, trackedTask());
        tracker.statuses.set('ext-1', new Error('status endpoint down'));

        const report = await runner.runCycle();

        expect(report.errors).toBe(1);
        expect(channel.depth(QUEUE)).toBe(1);
        expect(sink.responses).toEqual([]);
    });

    it('acks once the response is dead-lettered, requeues when it is lost', async () => {
        tracker.statuses.set('ext-1', {state: 'failed', errorMessage: 'rejected'});
        channel.push(QUEUE, trackedTask());
        sink.outcome = {delivered: false, deadLettered: true, attempts: 5};

        expect((await runner.runCycle()).resolved).toBe(1);
        expect(channel.depth(QUEUE)).toBe(0);

        channel.push(QUEUE, trackedTask());
        sink.outcome = {delivered: false, deadLettered: false, attempts: 5};

        expect((await runner.runCycle()).errors).toBe(1);
        expect(channel.depth(QUEUE)).toBe(1);
    });

    it('dead-letters parked messages without an external id', async () => {
        const {external_id: _dropped, ...untracked} = trackedTask({task_id: 't-8'});
        channel.push(QUEUE, untracked);

        const report = await runner.runCycle();

        expect(report.malformed).toBe(1);
        expect(sink.letters[0]).toMatchObject({
            errorClass: 'malformed-task',
            reason: 'Tracked task is missing external_id',
            context: {taskId: 't-8'}
        });
        expect(channel.acked).toHaveLength(1);
    });

    it('accumulates totals and cleans up the tracker on stop', async () => {
        channel.push(QUEUE, trackedTask());
        await runner.runCycle();
        await runner.runCycle();
        await runner.stop();

        expect(runner.stats()).toEqual({
            system: 'openproject',
            queue: QUEUE,
            checked: 2,
            resolved: 0,
            pending: 2,
            errors: 0,
            malformed: 0
        });
        expect(tracker.cleanups).toBe(1);
    });
});

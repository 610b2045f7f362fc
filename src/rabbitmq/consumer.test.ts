import {describe, it, expect, beforeEach} from 'vitest';
import {QueueConsumer} from './consumer';
import {BaseMessageHandler} from '../consumers/baseHandler';
import {HandlerResult} from '../consumers/types';
import {TaskMessage} from '../types/task_message';
import {FakeConsumeChannel} from '../../test/support/fakes';
import {RecordingDeadLetters, RecordingSink, sampleTask} from '../../test/support/builders';

class ScriptedHandler extends BaseMessageHandler {
    outcomes: Array<HandlerResult | null> = [];
    cleanups = 0;
    private gate: Promise<void> = Promise.resolve();
    private open: () => void = () => undefined;

    constructor() {
        super('notifications', new RecordingSink());
    }

    hold(): void {
        this.gate = new Promise(resolve => {
            this.open = resolve;
        });
    }

    release(): void {
        this.open();
    }

    async doWork(_message: TaskMessage): Promise<HandlerResult | null> {
        await this.gate;
        const next = this.outcomes.shift();
        return next === undefined ? {variables: {}} : next;
    }

    async cleanup(): Promise<void> {
        this.cleanups++;
    }
}

describe('QueueConsumer', () => {
    let channel: FakeConsumeChannel;
    let handler: ScriptedHandler;
    let deadLetters: RecordingDeadLetters;
    let consumer: QueueConsumer;

    beforeEach(async () => {
        channel = new FakeConsumeChannel();
        handler = new ScriptedHandler();
        deadLetters = new RecordingDeadLetters();
        consumer = new QueueConsumer(channel, handler, deadLetters);
        await consumer.start();
    });

    it('consumes from the handler queue', () => {
        expect(consumer.queue).toBe('notifications.queue');
        expect(channel.consumedQueue).toBe('notifications.queue');
    });

    it('acks on success and requeues on failure', async () => {
        handler.outcomes = [{variables: {}}, null];

        const first = channel.deliver(sampleTask({task_id: 't-1'}));
        const second = channel.deliver(sampleTask({task_id: 't-2'}));
        await consumer.stop();

        expect(channel.acked).toEqual([first]);
        expect(channel.requeued).toEqual([second]);
        expect(consumer.stats()).toEqual({queue: 'notifications.queue', received: 2, acked: 1, requeued: 1, malformed: 0});
    });

    it('dead-letters malformed deliveries and acks them once stored', async () => {
        const tag = channel.deliver({task_id: 't-9', topic_name: 'send_email'});
        const garbage = channel.deliver('not json');
        await consumer.stop();

        expect(channel.acked).toEqual([tag, garbage]);
        expect(deadLetters.letters.map(letter => [letter.errorClass, letter.reason, letter.context.taskId])).toEqual([
            ['malformed-task', 'Task message is missing process_instance_id', 't-9'],
            ['malformed-task', 'Invalid JSON payload', undefined]
        ]);
        expect(deadLetters.letters[1].payload).toBe('not json');
        expect(consumer.stats().malformed).toBe(2);
    });

    it('requeues a malformed delivery when the dead letter is not stored', async () => {
        deadLetters.store = false;

        const tag = channel.deliver({foo: 'bar'});
        await consumer.stop();

        expect(channel.requeued).toEqual([tag]);
    });

    it('waits for in-flight work before releasing the handler', async () => {
        handler.hold();
        const tag = channel.deliver(sampleTask());

        const stopping = consumer.stop();
        await Promise.resolve();
        expect(channel.cancelled).toEqual(['ctag-1']);
        expect(handler.cleanups).toBe(0);

        handler.release();
        await stopping;

        expect(channel.acked).toEqual([tag]);
        expect(handler.cleanups).toBe(1);
    });

    it('releases the handler only once', async () => {
        await consumer.stop();
        await consumer.stop();

        expect(handler.cleanups).toBe(1);
        expect(channel.cancelled).toEqual(['ctag-1']);
    });
});

import {describe, it, expect} from 'vitest';
import crypto from 'crypto';
import {WebhookHandler} from './handler';
import {WebhookSettings} from '../../config/config';
import {FakeReply, RecordedRequest, fakeHttp} from '../../../test/support/fakes';
import {RecordingSink, sampleTask} from '../../../test/support/builders';

function handlerWith(webhook: WebhookSettings, reply: (request: RecordedRequest) => FakeReply) {
    const {http, requests} = fakeHttp(reply);
    const sink = new RecordingSink();
    return {handler: new WebhookHandler('bitrix24', sink, webhook, {http}), sink, requests};
}

describe('WebhookHandler', () => {
    it('posts the task and completes it with the returned variables', async () => {
        const {handler, sink, requests} = handlerWith({url: 'http://bitrix.test/hook'}, () => ({
            status: 200,
            data: {external_id: 'deal-7', variables: {deal_id: 7}}
        }));

        const acked = await handler.processMessage(sampleTask({task_id: 't-3', topic_name: 'bitrix_create_deal'}));

        expect(acked).toBe(true);
        expect(requests[0]).toMatchObject({method: 'POST', url: 'http://bitrix.test/hook'});
        expect(requests[0].body).toMatchObject({task: {task_id: 't-3', topic_name: 'bitrix_create_deal'}});
        expect(requests[0].headers['user-agent']).toBe('Task-Bridge-Webhook/1.0');
        expect(requests[0].headers['x-webhook-signature']).toBeUndefined();
        expect(sink.responses[0]).toMatchObject({
            task_id: 't-3',
            status: 'complete',
            variables: {external_id: 'deal-7', deal_id: 7},
            source_queue: 'bitrix24.queue'
        });
    });

    it('signs the exact body it sends', async () => {
        const {handler, requests} = handlerWith({url: 'http://bitrix.test/hook', secret: 'test-secret'}, () => ({status: 204}));

        await handler.processMessage(sampleTask());

        const sent = JSON.stringify(requests[0].body);
        const expected = crypto.createHmac('sha256', 'test-secret').update(sent).digest('hex');
        expect(requests[0].headers['x-webhook-signature']).toBe(expected);
    });

    it('requeues on a non-2xx answer or a transport error', async () => {
        const rejected = handlerWith({url: 'http://bitrix.test/hook'}, () => ({status: 500, data: 'boom'}));
        const unreachable = handlerWith({url: 'http://bitrix.test/hook'}, () => ({networkError: 'connect ECONNREFUSED'}));

        await expect(rejected.handler.processMessage(sampleTask())).resolves.toBe(false);
        await expect(unreachable.handler.processMessage(sampleTask())).resolves.toBe(false);
        expect(rejected.sink.responses).toEqual([]);
    });

    it('parks the task when the endpoint asks to await completion', async () => {
        const {handler, sink} = handlerWith(
            {url: 'http://bitrix.test/hook', statusUrl: 'http://bitrix.test/status'},
            () => ({status: 202, data: {external_id: 'deal-8', await_completion: true}})
        );

        await handler.processMessage(sampleTask({task_id: 't-4'}));

        expect(sink.responses).toEqual([]);
        expect(sink.tracked[0].queue).toBe('bitrix24.sent.queue');
        expect(sink.tracked[0].task.external_id).toBe('deal-8');
    });

    it('completes immediately when completion cannot be tracked', async () => {
        const {handler, sink} = handlerWith(
            {url: 'http://bitrix.test/hook'},
            () => ({status: 202, data: {external_id: 'deal-9', await_completion: true}})
        );

        await handler.processMessage(sampleTask());

        expect(sink.tracked).toEqual([]);
        expect(sink.responses[0].variables).toEqual({external_id: 'deal-9'});
    });

    it('treats a body without fields as an empty result', async () => {
        const {handler, sink} = handlerWith({url: 'http://bitrix.test/hook'}, () => ({status: 200, data: 'ok'}));

        await handler.processMessage(sampleTask());

        expect(sink.responses[0].variables).toEqual({});
    });
});

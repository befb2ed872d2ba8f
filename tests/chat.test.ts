import express from 'express';
import request from 'supertest';
import { createDependencies } from '../src/container';
import { greetingReply, leadRequestReply, leadThanksReply } from '../src/logic/replies';
import { SessionStore } from '../src/memory/sessionStore';
import { createApp } from '../src/server';
import { RecordingSink, ScriptedCompletion, testConfig, ThrowingEmbedder } from './helpers/fakes';

const ANSWER = 'Our Basic plan is 99 USD per month.';

describe('Chat API', () => {
  let app: express.Express;
  let completion: ScriptedCompletion;
  let notifier: RecordingSink;

  beforeEach(async () => {
    completion = new ScriptedCompletion(() => ANSWER);
    notifier = new RecordingSink();
    const deps = await createDependencies(testConfig(), {
      embedder: new ThrowingEmbedder(),
      completion,
      notifier,
    });
    app = createApp(deps);
  });

  it('reports health', async () => {
    const response = await request(app).get('/health').expect(200);
    expect(response.body).toEqual({ status: 'ok' });
  });

  it('rejects a body without a message', async () => {
    const response = await request(app).post('/api/chat').send({ sessionId: 'bad' }).expect(400);
    expect(response.body.error).toContain('message');
  });

  it('rejects messages over 2000 characters', async () => {
    await request(app)
      .post('/api/chat')
      .send({ message: 'a'.repeat(2001), sessionId: 'long' })
      .expect(400);
  });

  it('rejects messages that are empty after sanitizing', async () => {
    const response = await request(app).post('/api/chat').send({ message: '<>', sessionId: 'empty' }).expect(400);
    expect(response.body).toEqual({ error: 'message: empty after sanitizing' });
  });

  it('rejects malformed JSON', async () => {
    const response = await request(app)
      .post('/api/chat')
      .set('Content-Type', 'application/json')
      .send('{"message": ')
      .expect(400);
    expect(response.body).toEqual({ error: 'Invalid JSON body' });
  });

  it('greets a new session', async () => {
    const response = await request(app).post('/api/chat').send({ message: 'hello', sessionId: 'greet' }).expect(200);
    expect(response.body).toEqual({ reply: greetingReply('en', undefined), intent: 'greeting', state: 'ACTIVE' });
  });

  it('answers through the model when retrieval is unavailable', async () => {
    const response = await request(app)
      .post('/api/chat')
      .send({ message: 'How much does it cost?', sessionId: 'pricing' })
      .expect(200);

    expect(response.body).toEqual({ reply: ANSWER, intent: 'pricing', state: 'ACTIVE' });
    expect(completion.systemPrompt(0)).not.toContain('Business knowledge:');
  });

  it('keeps the conversation per session and captures a lead', async () => {
    const sessionId = 'lead-flow';
    const pending = await request(app)
      .post('/api/chat')
      .send({ message: 'I want to buy a bot', sessionId })
      .expect(200);
    expect(pending.body).toEqual({ reply: leadRequestReply('en'), intent: 'lead', state: 'LEAD_PENDING' });

    const collected = await request(app)
      .post('/api/chat')
      .send({ message: 'Dana Levi 0501234567 dana@test.com', sessionId })
      .expect(200);
    expect(collected.body.reply).toBe(leadThanksReply('en', 'Dana Levi'));
    expect(collected.body.state).toBe('LEAD_COLLECTED');
    expect(notifier.leads).toHaveLength(1);
  });

  it('clears a session', async () => {
    await request(app).post('/api/chat').send({ message: 'hello', sessionId: 'to-clear' }).expect(200);

    const cleared = await request(app).post('/api/clear').send({ sessionId: 'to-clear' }).expect(200);
    expect(cleared.body).toEqual({ status: 'ok', cleared: true });

    const again = await request(app).post('/api/clear').send({ sessionId: 'to-clear' }).expect(200);
    expect(again.body).toEqual({ status: 'ok', cleared: false });

    await request(app).post('/api/clear').send({}).expect(400);
  });

  it('hides internal failures behind a 500', async () => {
    const failing = createApp({
      config: testConfig(),
      core: {
        resolve: async () => {
          throw new Error('boom');
        },
      },
      sessions: new SessionStore(1000),
    });

    const response = await request(failing).post('/api/chat').send({ message: 'hello', sessionId: 'x' }).expect(500);
    expect(response.body).toEqual({ error: 'Internal server error' });
  });
});

import assert from 'node:assert/strict';
import test, { type TestContext } from 'node:test';

import type { ParticipantSummary, QuestionSummary, SessionSummary } from '../src/domain/summaries.js';
import { buildServer } from '../src/server/buildServer.js';
import type { ServerConfig } from '../src/server/config.js';
import type { ErrorResponse, FastifyZodInstance } from '../src/server/http.js';
import { StoreTimeoutError } from '../src/services/errors.js';
import { SessionService, type SessionServiceOptions } from '../src/services/sessionService.js';
import type { SessionStore } from '../src/services/sessionStore.js';
import { FakePool } from './support/fakePool.js';
import { MemorySessionStore } from './support/memorySessionStore.js';

const testConfig: ServerConfig = {
  env: 'test',
  port: 0,
  host: '127.0.0.1',
  logLevel: 'silent',
  corsOrigins: undefined,
  hostSessionLimit: 3,
  pendingQuestionLimit: 3,
  storeTimeoutMs: 1000
};

async function createServer(t: TestContext, store: SessionStore, options: SessionServiceOptions = {}) {
  const pool = new FakePool();
  const server = await buildServer({
    config: testConfig,
    dependencies: { pool, sessions: new SessionService(store, options) }
  });
  t.after(() => server.close());
  return { server, pool };
}

async function createSession(
  server: FastifyZodInstance,
  payload: Record<string, unknown> = { title: '統計学入門', host_display_name: 'Ana' }
) {
  const response = await server.inject({ method: 'POST', url: '/api/v1/sessions', payload });
  assert.equal(response.statusCode, 201, response.body);
  return response.json<SessionSummary>();
}

function userIdOf(store: MemorySessionStore, displayName: string): number {
  const user = store.users().find((candidate) => candidate.displayName === displayName);
  assert.ok(user);
  return user.id;
}

test('POST /api/v1/sessions: 201 でセッション要約を返す', async (t) => {
  const { server } = await createServer(t, new MemorySessionStore());
  const response = await server.inject({
    method: 'POST',
    url: '/api/v1/sessions',
    payload: { title: '  統計学入門 ', host_display_name: ' Ana ' }
  });
  assert.equal(response.statusCode, 201);
  const body = response.json<SessionSummary>();
  assert.match(body.code, /^[A-Z0-9]{6}$/);
  assert.equal(body.title, '統計学入門');
  assert.equal(body.status, 'draft');
  assert.deepEqual(body.host, { id: 1, display_name: 'Ana' });
});

test('POST /api/v1/sessions: スキーマ違反は 422、空白の表示名は 400', async (t) => {
  const { server } = await createServer(t, new MemorySessionStore());

  const missingTitle = await server.inject({ method: 'POST', url: '/api/v1/sessions', payload: { host_display_name: 'Ana' } });
  assert.equal(missingTitle.statusCode, 422);
  assert.equal(missingTitle.json<ErrorResponse>().code, 'REQUEST_VALIDATION_FAILED');

  const blankHost = await server.inject({
    method: 'POST',
    url: '/api/v1/sessions',
    payload: { title: '講義', host_display_name: '   ' }
  });
  assert.equal(blankHost.statusCode, 400);
  assert.deepEqual(blankHost.json<ErrorResponse>(), {
    message: '表示名を入力してください。',
    code: 'INVALID_HOST_DISPLAY_NAME'
  });

  const noHost = await server.inject({ method: 'POST', url: '/api/v1/sessions', payload: { title: '講義' } });
  assert.equal(noHost.statusCode, 400);
  assert.equal(noHost.json<ErrorResponse>().code, 'INVALID_HOST_DISPLAY_NAME');
});

test('POST /api/v1/sessions: ホストの上限超過は 409', async (t) => {
  const { server } = await createServer(t, new MemorySessionStore());
  for (let i = 0; i < 3; i += 1) {
    await createSession(server);
  }
  const response = await server.inject({
    method: 'POST',
    url: '/api/v1/sessions',
    payload: { title: '4件目', host_display_name: 'Ana' }
  });
  assert.equal(response.statusCode, 409);
  assert.deepEqual(response.json<ErrorResponse>(), {
    message: '同時に開催できるセッションは3件までです。',
    code: 'HOST_SESSION_LIMIT_EXCEEDED'
  });
  assert.equal(response.headers['retry-after'], undefined);
});

test('POST /api/v1/sessions: 参加コード枯渇は 503 と retry-after', async (t) => {
  const { server } = await createServer(t, new MemorySessionStore(), { code: { randomIndex: () => 0 } });
  await createSession(server);
  const response = await server.inject({
    method: 'POST',
    url: '/api/v1/sessions',
    payload: { title: '講義B', host_display_name: 'Ben' }
  });
  assert.equal(response.statusCode, 503);
  assert.equal(response.headers['retry-after'], '1');
  assert.equal(response.json<ErrorResponse>().code, 'CODE_COLLISION_EXHAUSTED');
});

test('GET /api/v1/sessions: 新しい順に limit 件を返し、範囲外の limit は 422', async (t) => {
  const { server } = await createServer(t, new MemorySessionStore());
  const first = await createSession(server, { title: 'A', host_display_name: 'Ana' });
  const second = await createSession(server, { title: 'B', host_display_name: 'Ben' });

  const all = await server.inject({ method: 'GET', url: '/api/v1/sessions' });
  assert.equal(all.statusCode, 200);
  assert.deepEqual(all.json<SessionSummary[]>().map((session) => session.code), [second.code, first.code]);

  const limited = await server.inject({ method: 'GET', url: '/api/v1/sessions?limit=1' });
  assert.deepEqual(limited.json<SessionSummary[]>().map((session) => session.code), [second.code]);

  const invalid = await server.inject({ method: 'GET', url: '/api/v1/sessions?limit=0' });
  assert.equal(invalid.statusCode, 422);
});

test('GET /api/v1/sessions/:code: 詳細を返し、未知のコードは 404', async (t) => {
  const { server } = await createServer(t, new MemorySessionStore());
  const created = await createSession(server);

  const found = await server.inject({ method: 'GET', url: `/api/v1/sessions/${created.code}` });
  assert.equal(found.statusCode, 200);
  assert.deepEqual(found.json<SessionSummary>(), created);

  const missing = await server.inject({ method: 'GET', url: '/api/v1/sessions/NOPE00' });
  assert.equal(missing.statusCode, 404);
  assert.deepEqual(missing.json<ErrorResponse>(), { message: 'セッションが見つかりません。', code: 'SESSION_NOT_FOUND' });
});

test('POST /api/v1/sessions/:code/join: 参加者名簿に反映され、終了済みは 409', async (t) => {
  const store = new MemorySessionStore();
  const { server } = await createServer(t, store);
  const created = await createSession(server);

  const joined = await server.inject({
    method: 'POST',
    url: `/api/v1/sessions/${created.code}/join`,
    payload: { display_name: 'Bea' }
  });
  assert.equal(joined.statusCode, 200);
  assert.deepEqual(joined.json<SessionSummary>(), created);

  const roster = await server.inject({ method: 'GET', url: `/api/v1/sessions/${created.code}/participants` });
  assert.equal(roster.statusCode, 200);
  assert.deepEqual(
    roster.json<ParticipantSummary[]>().map((entry) => [entry.user.display_name, entry.role]),
    [['Ana', 'host'], ['Bea', 'participant']]
  );

  store.setSessionStatus(created.code, 'ended');
  const rejected = await server.inject({
    method: 'POST',
    url: `/api/v1/sessions/${created.code}/join`,
    payload: { display_name: 'Cy' }
  });
  assert.equal(rejected.statusCode, 409);
  assert.equal(rejected.json<ErrorResponse>().code, 'SESSION_NOT_JOINABLE');
});

test('POST /api/v1/sessions/:code/questions: 呼び出し元の識別と参加者チェック', async (t) => {
  const store = new MemorySessionStore();
  const { server } = await createServer(t, store);
  const created = await createSession(server);
  await server.inject({ method: 'POST', url: `/api/v1/sessions/${created.code}/join`, payload: { display_name: 'Bea' } });
  await createSession(server, { title: '別の講義', host_display_name: 'Ben' });
  const url = `/api/v1/sessions/${created.code}/questions`;

  const anonymous = await server.inject({ method: 'POST', url, payload: { body: '質問です' } });
  assert.equal(anonymous.statusCode, 401);
  assert.deepEqual(anonymous.json<ErrorResponse>(), {
    message: 'ユーザーIDを x-user-id ヘッダーで指定してください。',
    code: 'CALLER_IDENTITY_REQUIRED'
  });

  const malformed = await server.inject({ method: 'POST', url, headers: { 'x-user-id': 'abc' }, payload: { body: '質問です' } });
  assert.equal(malformed.statusCode, 401);

  const outsider = await server.inject({
    method: 'POST',
    url,
    headers: { 'x-user-id': String(userIdOf(store, 'Ben')) },
    payload: { body: '質問です' }
  });
  assert.equal(outsider.statusCode, 403);
  assert.equal(outsider.json<ErrorResponse>().code, 'NOT_PARTICIPANT');

  const beaId = userIdOf(store, 'Bea');
  const tooLong = await server.inject({
    method: 'POST',
    url,
    headers: { 'x-user-id': String(beaId) },
    payload: { body: 'q'.repeat(281) }
  });
  assert.equal(tooLong.statusCode, 422);

  const accepted = await server.inject({
    method: 'POST',
    url,
    headers: { 'x-user-id': String(beaId) },
    payload: { body: ' 中央値とは？ ' }
  });
  assert.equal(accepted.statusCode, 201);
  const question = accepted.json<QuestionSummary>();
  assert.equal(question.body, '中央値とは？');
  assert.equal(question.status, 'pending');
  assert.equal(question.session_id, created.id);
  assert.deepEqual(question.author, { id: beaId, display_name: 'Bea' });
});

test('POST /api/v1/sessions/:code/questions: 長さは前後の空白を除いたコードポイント数で数える', async (t) => {
  const store = new MemorySessionStore();
  const { server } = await createServer(t, store);
  const created = await createSession(server, { title: '📊'.repeat(200), host_display_name: ` ${'🎓'.repeat(100)} ` });
  assert.equal(created.title, '📊'.repeat(200));
  assert.equal(created.host.display_name, '🎓'.repeat(100));
  const headers = { 'x-user-id': String(created.host.id) };
  const url = `/api/v1/sessions/${created.code}/questions`;

  const emoji = await server.inject({ method: 'POST', url, headers, payload: { body: '🤔'.repeat(150) } });
  assert.equal(emoji.statusCode, 201);
  assert.equal(emoji.json<QuestionSummary>().body, '🤔'.repeat(150));

  const padded = await server.inject({ method: 'POST', url, headers, payload: { body: `  ${'q'.repeat(280)}  ` } });
  assert.equal(padded.statusCode, 201);
  assert.equal(padded.json<QuestionSummary>().body, 'q'.repeat(280));

  const tooLong = await server.inject({ method: 'POST', url, headers, payload: { body: '🤔'.repeat(281) } });
  assert.equal(tooLong.statusCode, 422);
  assert.equal(tooLong.json<ErrorResponse>().code, 'REQUEST_VALIDATION_FAILED');
});

test('POST /api/v1/sessions/:code/questions: 未回答上限を超えると 409', async (t) => {
  const store = new MemorySessionStore();
  const { server } = await createServer(t, store);
  const created = await createSession(server);
  const headers = { 'x-user-id': String(userIdOf(store, 'Ana')) };
  const url = `/api/v1/sessions/${created.code}/questions`;

  for (const body of ['Q1', 'Q2', 'Q3']) {
    const response = await server.inject({ method: 'POST', url, headers, payload: { body } });
    assert.equal(response.statusCode, 201);
  }
  const rejected = await server.inject({ method: 'POST', url, headers, payload: { body: 'Q4' } });
  assert.equal(rejected.statusCode, 409);
  assert.equal(rejected.json<ErrorResponse>().code, 'QUESTION_LIMIT_EXCEEDED');
});

test('GET /api/v1/sessions/:code/questions: 状態で絞り込み、不正な状態は 422', async (t) => {
  const store = new MemorySessionStore();
  const { server } = await createServer(t, store);
  const created = await createSession(server);
  const headers = { 'x-user-id': String(userIdOf(store, 'Ana')) };
  const url = `/api/v1/sessions/${created.code}/questions`;

  const first = (await server.inject({ method: 'POST', url, headers, payload: { body: 'Q1' } })).json<QuestionSummary>();
  const second = (await server.inject({ method: 'POST', url, headers, payload: { body: 'Q2' } })).json<QuestionSummary>();
  store.setQuestionStatus(first.id, 'answered');

  const all = await server.inject({ method: 'GET', url });
  assert.deepEqual(all.json<QuestionSummary[]>().map((question) => question.id), [second.id, first.id]);

  const pending = await server.inject({ method: 'GET', url: `${url}?status=pending` });
  assert.deepEqual(pending.json<QuestionSummary[]>().map((question) => question.id), [second.id]);

  const invalid = await server.inject({ method: 'GET', url: `${url}?status=archived` });
  assert.equal(invalid.statusCode, 422);
});

test('ストアのタイムアウトは 504 と retry-after', async (t) => {
  const timingOut: SessionStore = {
    transaction: async () => {
      throw new StoreTimeoutError();
    }
  };
  const { server } = await createServer(t, timingOut);
  const response = await server.inject({ method: 'GET', url: '/api/v1/sessions/ABC123' });
  assert.equal(response.statusCode, 504);
  assert.equal(response.headers['retry-after'], '1');
  assert.deepEqual(response.json<ErrorResponse>(), {
    message: 'データベースの応答がタイムアウトしました。',
    code: 'STORE_TIMEOUT'
  });
});

test('想定外のエラーは 500 INTERNAL_ERROR', async (t) => {
  const broken: SessionStore = {
    transaction: async () => {
      throw new Error('connection reset');
    }
  };
  const { server } = await createServer(t, broken);
  const response = await server.inject({ method: 'GET', url: '/api/v1/sessions' });
  assert.equal(response.statusCode, 500);
  assert.deepEqual(response.json<ErrorResponse>(), { message: '予期せぬエラーが発生しました。', code: 'INTERNAL_ERROR' });
});

test('サーバー終了時にプールを閉じる', async () => {
  const pool = new FakePool();
  const server = await buildServer({
    config: testConfig,
    dependencies: { pool, sessions: new SessionService(new MemorySessionStore()) }
  });
  await server.ready();
  await server.close();
  assert.equal(pool.ended, true);
});

import assert from 'node:assert/strict';
import test from 'node:test';
import { resolveFirstAgent } from '../src/agents.ts';
import { ThousandEyesClient } from '../src/client.ts';
import { ThousandEyesNotFoundError } from '../src/errors.ts';
import { register as registerAgents } from '../src/commands/agents.ts';
import {
  assertCalledPath,
  captureConsole,
  createProgram,
  installFetchFailure,
  installFetchMock,
  runCli,
} from './cli-test-helpers.ts';

const AGENTS = {
  agents: [
    { agentId: '101', agentName: 'Frankfurt, Germany', agentType: 'cloud', location: 'Frankfurt Area, Germany', countryId: 'DE' },
    { agentId: '202', agentName: 'Tokyo, Japan', agentType: 'cloud', location: 'Tokyo, Japan' },
    { agentId: '303', agentName: 'Branch Office', agentType: 'enterprise', location: 'Oslo, Norway' },
  ],
};

test('resolveFirstAgent returns the first agent in listing order', async () => {
  const mock = installFetchMock(async () => ({ body: AGENTS }));

  try {
    const { result, stderr } = await captureConsole(() => resolveFirstAgent(new ThousandEyesClient('test-token')));

    assert.equal(result, 101);
    assert.deepEqual(stderr, ['Using agent: Frankfurt, Germany (ID: 101)']);
    assertCalledPath(mock.calls, '/v7/agents', 'GET');
  } finally {
    mock.restore();
  }
});

test('resolveFirstAgent works with a single-agent listing', async () => {
  const mock = installFetchMock(async () => ({ body: { agents: [{ agentId: 7, agentName: 'Solo' }] } }));

  try {
    const { result } = await captureConsole(() => resolveFirstAgent(new ThousandEyesClient('test-token')));
    assert.equal(result, 7);
  } finally {
    mock.restore();
  }
});

test('resolveFirstAgent returns null for an empty listing', async () => {
  const mock = installFetchMock(async () => ({ body: { agents: [] } }));

  try {
    const { result, stderr } = await captureConsole(() => resolveFirstAgent(new ThousandEyesClient('test-token')));

    assert.equal(result, null);
    assert.deepEqual(stderr, ['No agents found in your account.']);
  } finally {
    mock.restore();
  }
});

test('resolveFirstAgent logs the status and body of a failed listing', async () => {
  const mock = installFetchMock(async () => ({ status: 500, body: { message: 'boom' } }));

  try {
    const { result, stderr } = await captureConsole(() => resolveFirstAgent(new ThousandEyesClient('test-token')));

    assert.equal(result, null);
    assert.deepEqual(stderr, ['Failed to fetch agents: 500 - {"message":"boom"}']);
  } finally {
    mock.restore();
  }
});

test('resolveFirstAgent does not skip a first agent without a usable ID', async () => {
  const mock = installFetchMock(async () => ({
    body: { agents: [{ agentId: 'abc', agentName: 'Broken' }, { agentId: 202, agentName: 'Tokyo' }] },
  }));

  try {
    const { result, stderr } = await captureConsole(() => resolveFirstAgent(new ThousandEyesClient('test-token')));

    assert.equal(result, null);
    assert.deepEqual(stderr, ['First agent has no usable ID: {"agentId":"abc","agentName":"Broken"}']);
  } finally {
    mock.restore();
  }
});

test('resolveFirstAgent returns null when the transport fails', async () => {
  const failure = installFetchFailure();

  try {
    const { result, stderr } = await captureConsole(() => resolveFirstAgent(new ThousandEyesClient('test-token')));

    assert.equal(result, null);
    assert.deepEqual(stderr, ['Failed to fetch agents: fetch failed']);
  } finally {
    failure.restore();
  }
});

test('agents list prints flattened agents as JSON', async () => {
  const program = createProgram([registerAgents]);
  const mock = installFetchMock(async () => ({ body: AGENTS }));

  try {
    const { stdout } = await runCli(program, ['agents', 'list']);

    assert.deepEqual(JSON.parse(stdout[0]), [
      { id: 101, name: 'Frankfurt, Germany', type: 'cloud', location: 'Frankfurt Area, Germany', country: 'DE' },
      { id: 202, name: 'Tokyo, Japan', type: 'cloud', location: 'Tokyo, Japan', country: null },
      { id: 303, name: 'Branch Office', type: 'enterprise', location: 'Oslo, Norway', country: null },
    ]);
  } finally {
    mock.restore();
  }
});

test('agents list leaves out agents without a usable ID', async () => {
  const program = createProgram([registerAgents]);
  const mock = installFetchMock(async () => ({
    body: { agents: [{ agentId: 'abc', agentName: 'Broken' }, { agentId: 202, agentName: 'Tokyo' }] },
  }));

  try {
    const { stdout } = await runCli(program, ['agents', 'list']);

    assert.deepEqual(JSON.parse(stdout[0]), [
      { id: 202, name: 'Tokyo', type: null, location: null, country: null },
    ]);
  } finally {
    mock.restore();
  }
});

test('agents first fails with a not-found error when there are no agents', async () => {
  const program = createProgram([registerAgents]);
  const mock = installFetchMock(async () => ({ body: { agents: [] } }));

  try {
    await assert.rejects(runCli(program, ['agents', 'first']), ThousandEyesNotFoundError);
  } finally {
    mock.restore();
  }
});

import assert from 'node:assert/strict';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import test from 'node:test';
import { reportFileName, saveReport } from '../src/report.ts';
import { captureConsole } from './cli-test-helpers.ts';

test('reportFileName is derived from the test name', () => {
  assert.equal(reportFileName('foo'), 'foo_report.json');
});

test('saveReport writes indented JSON that parses back to the payload', async () => {
  const dir = mkdtempSync(join(tmpdir(), 'te-cli-report-'));

  try {
    const { result, stderr } = await captureConsole(async () => saveReport('foo', { a: 1 }, dir));

    assert.equal(result, join(dir, 'foo_report.json'));
    assert.equal(readFileSync(result, 'utf-8'), '{\n  "a": 1\n}');
    assert.deepEqual(JSON.parse(readFileSync(result, 'utf-8')), { a: 1 });
    assert.deepEqual(stderr, [`Report saved to: ${result}`]);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test('saveReport overwrites an earlier report', async () => {
  const dir = mkdtempSync(join(tmpdir(), 'te-cli-report-'));

  try {
    writeFileSync(join(dir, 'foo_report.json'), 'stale');
    const { result } = await captureConsole(async () => saveReport('foo', { results: [] }, dir));

    assert.deepEqual(JSON.parse(readFileSync(result, 'utf-8')), { results: [] });
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test('saveReport writes array payloads as they are', async () => {
  const dir = mkdtempSync(join(tmpdir(), 'te-cli-report-'));

  try {
    const { result } = await captureConsole(async () => saveReport('foo', [{ responseCode: 200 }], dir));

    assert.deepEqual(JSON.parse(readFileSync(result, 'utf-8')), [{ responseCode: 200 }]);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test('saveReport lets write failures propagate', () => {
  const missingDir = join(tmpdir(), 'te-cli-missing-dir', 'nested');
  assert.throws(() => saveReport('foo', { a: 1 }, missingDir), { code: 'ENOENT' });
});

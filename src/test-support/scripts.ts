// src/test-support/scripts.ts
// Small Node programs standing in for user scripts. They run under
// process.execPath, so tests need no other interpreter.
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { RuntimeSpec } from '@/runner/exec/spawn';
import { ENDPOINT_ENV } from '@/runner/stream/bridge';

/** Runtime that executes the generated scripts. */
export const nodeRuntime: RuntimeSpec = { command: process.execPath, args: [] };

export const writeScript = async (
  root: string,
  rel: string,
  src: string,
): Promise<string> => {
  const abs = path.join(root, rel);
  await mkdir(path.dirname(abs), { recursive: true });
  await writeFile(abs, src, 'utf8');
  return abs;
};

/**
 * Discrete script: reads the state from stdin, binds `state` and `fn`
 * (value of --function, or null), runs `body` and prints `result` as JSON.
 */
export const discreteScript = (body: string): string => `
const chunks = [];
process.stdin.on('data', (c) => chunks.push(c));
process.stdin.on('end', () => {
  const text = Buffer.concat(chunks).toString('utf8');
  const state = text.trim() ? JSON.parse(text) : {};
  const at = process.argv.indexOf('--function');
  const fn = at >= 0 ? process.argv[at + 1] : null;
  let result;
  ${body}
  process.stdout.write(JSON.stringify(result) + '\\n');
});
`;

/** Echo the received state and function name: { fn, state }. */
export const echoScript = discreteScript('result = { fn, state };');

/** Print raw text and exit 0. */
export const printScript = (text: string): string =>
  `process.stdout.write(${JSON.stringify(text)});\n`;

/** Write to stderr and exit with `code`. */
export const failScript = (code: number, stderr = 'boom'): string =>
  `process.stderr.write(${JSON.stringify(`${stderr}\n`)});\nprocess.exit(${code.toString()});\n`;

/** Never finishes on its own (ignores stdin). */
export const sleepScript = 'setInterval(() => {}, 1000);\n';

/**
 * Starts a long-lived grandchild that inherits this script's stdio, prints
 * the grandchild's pid on stdout, then never finishes on its own.
 */
export const parentScript = `
const { spawn } = require('node:child_process');
const child = spawn(process.execPath, ['-e', 'setInterval(() => {}, 1000)'], {
  stdio: 'inherit',
});
process.stdout.write(String(child.pid) + '\\n');
setInterval(() => {}, 1000);
`;

/** Streaming script options. */
export type EmitterOptions = {
  /** Number of frames to send. */
  count: number;
  streamId?: string;
  /** Raw (unframed-JSON) bodies sent before the valid frames. */
  garbage?: string[];
  /** After sending: 'exit' with a code, or 'stay' alive until killed. */
  then?: { exit: number } | 'stay';
};

/**
 * Streaming script: connects to the endpoint from the environment and sends
 * `{ stream_id, payload: { i } }` frames for i = 0..count-1.
 */
export const emitterScript = (o: EmitterOptions): string => {
  const then = o.then ?? 'stay';
  const finish =
    then === 'stay'
      ? 'setInterval(() => {}, 1000);'
      : `sock.end(() => process.exit(${then.exit.toString()}));`;
  return `
const net = require('node:net');
const url = new URL(process.env[${JSON.stringify(ENDPOINT_ENV)}]);
const frame = (text) => {
  const body = Buffer.from(text, 'utf8');
  const head = Buffer.alloc(4);
  head.writeUInt32BE(body.length, 0);
  return Buffer.concat([head, body]);
};
const sock = net.connect(Number(url.port), url.hostname, () => {
  for (const g of ${JSON.stringify(o.garbage ?? [])}) sock.write(frame(g));
  for (let i = 0; i < ${o.count.toString()}; i++) {
    const msg = { payload: { i } };
    ${o.streamId ? `msg.stream_id = ${JSON.stringify(o.streamId)};` : ''}
    sock.write(frame(JSON.stringify(msg)));
  }
  ${finish}
});
`;
};

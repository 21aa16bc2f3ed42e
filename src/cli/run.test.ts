import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { BatchReport } from '../batch/report';
import { EXIT_CODES, findDefaultTemplatesDir, runCli, timestampedLogFile, type CliIO } from './run';

const TEMPLATES = path.resolve(__dirname, '../../templates');

const RAIL = `<root>
  <material>
    <renderpass><texunit><tiling><width>10.0</width></tiling></texunit></renderpass>
  </material>
</root>
`;

function captureIO(): CliIO & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: text => out.push(text),
    stderr: text => err.push(text),
    logSink: () => undefined,
  };
}

describe('runCli', () => {
  let root: string;
  let shapes: string;
  let out: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'scaler-cli-'));
    shapes = path.join(root, 'shapes');
    out = path.join(root, 'out');
    fs.mkdirSync(shapes);
    fs.writeFileSync(path.join(shapes, 'rail.nl2mat'), RAIL);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('prints usage when no paths are given', async () => {
    const io = captureIO();

    expect(await runCli([], { io })).toBe(EXIT_CODES.SUCCESS);
    expect(io.out.join('')).toContain('Usage: buildshape-scaler [options] [paths...]');
  });

  it('scales the given folder and prints a summary', async () => {
    const io = captureIO();

    const code = await runCli([shapes, '--templates', TEMPLATES, '--out', out], { io });

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(io.out.join('')).toContain('Groups: 1 succeeded, 0 partial, 0 failed, 0 skipped');
    expect(fs.readFileSync(path.join(out, 'x3', 'shapes', 'rail.nl2mat'), 'utf8')).toContain('<width>30.0</width>');
  });

  it('prints the report as JSON', async () => {
    const io = captureIO();

    await runCli([shapes, '--templates', TEMPLATES, '--out', out, '--scale', 'x2', '--json'], { io });
    const report: BatchReport = JSON.parse(io.out.join(''));

    expect(report.scales).toEqual(['x2']);
    expect(report.summary.outputsWritten).toBe(1);
  });

  it('returns the failure code when a file cannot be parsed', async () => {
    fs.writeFileSync(path.join(shapes, 'rail.nl2mat'), '<root>');
    const io = captureIO();

    expect(await runCli([shapes, '--templates', TEMPLATES, '--out', out], { io })).toBe(EXIT_CODES.FAILURES);
  });

  it('returns the configuration code for unknown scales', async () => {
    const io = captureIO();

    const code = await runCli([shapes, '--templates', TEMPLATES, '--out', out, '--scale', 'x9'], { io });

    expect(code).toBe(EXIT_CODES.CONFIG_ERROR);
    expect(io.err.join('')).toBe('Error: None of the requested scale factors is supported: x9\n');
  });

  it('returns the configuration code for invalid options', async () => {
    const io = captureIO();
    expect(await runCli([shapes, '--concurrency', '0'], { io })).toBe(EXIT_CODES.CONFIG_ERROR);
  });

  it('returns the cancelled code when aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const io = captureIO();

    const code = await runCli([shapes, '--templates', TEMPLATES, '--out', out], { io, signal: controller.signal });

    expect(code).toBe(EXIT_CODES.CANCELLED);
  });

  it('mirrors log lines into a log file', async () => {
    const logFile = path.join(root, 'run.log');
    const io = captureIO();

    await runCli([shapes, '--templates', TEMPLATES, '--out', out, '--log-file', logFile], { io });

    expect(fs.readFileSync(logFile, 'utf8')).toContain('Found material template');
  });
});

describe('helpers', () => {
  it('finds the templates folder above a directory', () => {
    expect(findDefaultTemplatesDir(__dirname)).toBe(TEMPLATES);
  });

  it('names log files after the start time', () => {
    expect(timestampedLogFile(new Date(2024, 2, 1, 14, 25, 30))).toBe('buildshape-scaler-20240301-142530.log');
  });
});

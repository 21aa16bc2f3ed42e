import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ERROR_MESSAGES } from '../constants/errors';
import type { ScaleRuleTable } from '../templates/rule-table';
import { loadTemplates } from '../templates/template-loader';
import { LoggerFactory } from '../utils/logger';
import { BatchOrchestrator } from './batch-orchestrator';

const TEMPLATES = path.resolve(__dirname, '../../templates');
const table = loadTemplates(TEMPLATES, LoggerFactory.silent());

const RAIL = `<?xml version="1.0" encoding="UTF-8"?>
<root>
  <material>
    <renderpass>
      <texunit>
        <map>rail.png</map>
        <tiling><width>10.0</width><height>5</height></tiling>
      </texunit>
    </renderpass>
  </material>
</root>
`;

const TRACK = `<?xml version="1.0" encoding="UTF-8"?>
<root>
  <sceneobject>
    <preview>track.png</preview>
    <dimensions><width>2.0</width><height>1</height></dimensions>
    <materialslot><material>rail.nl2mat</material></materialslot>
  </sceneobject>
</root>
`;

describe('BatchOrchestrator', () => {
  let root: string;
  let out: string;

  const write = (relative: string, content: string): string => {
    const filePath = path.join(root, relative);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  };
  const read = (relative: string): string => fs.readFileSync(path.join(out, relative), 'utf8');
  const orchestrator = (
    options: { signal?: AbortSignal; destination?: string; table?: ScaleRuleTable } = {}
  ): BatchOrchestrator =>
    new BatchOrchestrator(options.table ?? table, {
      destination: options.destination ?? out,
      concurrency: 2,
      logger: LoggerFactory.silent(),
      ...(options.signal ? { signal: options.signal } : {}),
    });

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'scaler-batch-'));
    out = path.join(root, 'out');
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('writes every scale of an object file and its material', async () => {
    write('shapes/track.nl2sco', TRACK);
    write('shapes/rail.nl2mat', RAIL);
    write('shapes/rail.png', 'texture');

    const report = await orchestrator().run([path.join(root, 'shapes')]);

    expect(report.scales).toEqual(['x1', 'x2', 'x3']);
    expect(report.groups).toHaveLength(1);
    expect(report.groups[0].outcome).toBe('succeeded');
    expect(report.groups[0].incomplete).toBe(false);
    expect(report.summary.outputsWritten).toBe(6);

    expect(read('x1/shapes/track.nl2sco')).toBe(TRACK);
    expect(read('x1/shapes/rail.nl2mat')).toBe(RAIL);
    expect(read('x2/shapes/rail.nl2mat')).toBe(RAIL.replace('<width>10.0</width><height>5</height>', '<width>20.0</width><height>10</height>'));
    expect(read('x3/shapes/rail.nl2mat')).toBe(RAIL.replace('<width>10.0</width><height>5</height>', '<width>30.0</width><height>15</height>'));
    expect(read('x2/shapes/track.nl2sco')).toBe(TRACK.replace('<width>2.0</width><height>1</height>', '<width>4.0</width><height>2</height>'));

    for (const tag of ['x1', 'x2', 'x3']) {
      expect(read(`${tag}/shapes/track.nl2sco`)).toContain('<material>rail.nl2mat</material>');
      expect(read(`${tag}/shapes/rail.png`)).toBe('texture');
    }
  });

  it('reports a missing companion file without failing the file', async () => {
    write('shapes/track.nl2sco', TRACK);
    write('shapes/rail.nl2mat', RAIL);

    const report = await orchestrator().run([path.join(root, 'shapes')]);
    const track = report.groups[0].files.find(file => file.relativePath === 'shapes/track.nl2sco');

    expect(track?.status).toBe('written');
    expect(track?.assets.map(asset => [asset.scale, asset.file, asset.status])).toEqual([
      ['x1', 'track.png', 'missing'],
      ['x2', 'track.png', 'missing'],
      ['x3', 'track.png', 'missing'],
    ]);
    expect(report.groups[0].outcome).toBe('succeeded');
  });

  it('scales a folder of bare materials without an object file', async () => {
    write('bare/a.nl2mat', RAIL);
    write('bare/b.nl2mat', RAIL);

    const report = await orchestrator().run([path.join(root, 'bare')]);
    const [group] = report.groups;

    expect(group.outcome).toBe('succeeded');
    expect(group.files.map(file => [file.relativePath, file.kind, file.status, file.variants.length])).toEqual([
      ['bare/a.nl2mat', 'material', 'written', 3],
      ['bare/b.nl2mat', 'material', 'written', 3],
    ]);
    expect(read('x3/bare/b.nl2mat')).toContain('<width>30.0</width>');
  });

  it('fails a malformed file while other groups are still written', async () => {
    write('broken/bad.nl2mat', '<root>\n  <material>\n</root>\n');
    write('broken/good.nl2mat', RAIL);
    write('fine/ok.nl2mat', RAIL);

    const report = await orchestrator().run([path.join(root, 'broken'), path.join(root, 'fine')]);
    const broken = report.groups.find(group => group.folder === path.join(root, 'broken'));
    const fine = report.groups.find(group => group.folder === path.join(root, 'fine'));

    expect(broken?.outcome).toBe('failed');
    const bad = broken?.files.find(file => file.relativePath === 'broken/bad.nl2mat');
    expect(bad?.status).toBe('failed');
    expect(bad?.stage).toBe('parsed');
    expect(bad?.variants).toEqual([]);
    expect(bad?.errors.map(error => error.tag)).toEqual(['MalformedInputError']);
    expect(broken?.files.find(file => file.relativePath === 'broken/good.nl2mat')?.status).toBe('written');

    expect(fine?.outcome).toBe('succeeded');
    expect(fs.existsSync(path.join(out, 'x2', 'fine', 'ok.nl2mat'))).toBe(true);
    expect(fs.existsSync(path.join(out, 'x2', 'broken', 'bad.nl2mat'))).toBe(false);
    expect(report.summary.groups).toEqual({ succeeded: 1, partial: 0, failed: 1, skipped: 0 });
  });

  it('marks a group incomplete when a referenced material has no output', async () => {
    write('shapes/track.nl2sco', TRACK.replace('rail.nl2mat', 'steel.nl2mat'));
    write('shapes/rail.nl2mat', RAIL);

    const report = await orchestrator().run([path.join(root, 'shapes')]);
    const [group] = report.groups;

    expect(group.outcome).toBe('partial');
    expect(group.incomplete).toBe(true);
    expect(group.integrityErrors.map(error => error.tag)).toEqual([
      'ReferentialIntegrityError',
      'ReferentialIntegrityError',
      'ReferentialIntegrityError',
    ]);
    expect(fs.existsSync(path.join(out, 'x2', 'shapes', 'rail.nl2mat'))).toBe(true);
  });

  it('reports write failures per variant', async () => {
    write('bare/a.nl2mat', RAIL);
    const blocked = write('blocked', 'a file, not a folder');

    const report = await orchestrator({ destination: blocked }).run([path.join(root, 'bare')]);
    const [file] = report.groups[0].files;

    expect(report.groups[0].outcome).toBe('failed');
    expect(file.status).toBe('failed');
    expect(file.variants.map(variant => [variant.scale, variant.status, variant.error?.tag])).toEqual([
      ['x1', 'failed', 'IOWriteError'],
      ['x2', 'failed', 'IOWriteError'],
      ['x3', 'failed', 'IOWriteError'],
    ]);
  });

  it('skips every group once the batch is cancelled', async () => {
    write('bare/a.nl2mat', RAIL);
    write('other/b.nl2mat', RAIL);
    const controller = new AbortController();
    controller.abort();

    const report = await orchestrator({ signal: controller.signal }).run([path.join(root, 'bare'), path.join(root, 'other')]);

    expect(report.cancelled).toBe(true);
    expect(report.groups.map(group => group.outcome)).toEqual(['skipped', 'skipped']);
    expect(report.groups[0].files[0].reason).toBe(ERROR_MESSAGES.GROUP_CANCELLED);
    expect(fs.existsSync(out)).toBe(false);
  });

  it('lists inputs it cannot use', async () => {
    const notes = write('notes.txt', 'hello');

    const report = await orchestrator().run([notes]);

    expect(report.groups).toEqual([]);
    expect(report.ungrouped.map(file => file.status)).toEqual(['skipped']);
    expect(report.summary.files).toEqual({ written: 0, skipped: 1, failed: 0 });
  });

  it('keeps the first group when two groups map to the same output', async () => {
    write('a/shapes/rail.nl2mat', RAIL);
    write('b/shapes/rail.nl2mat', RAIL.replace('<width>10.0</width>', '<width>99.0</width>'));

    const report = await orchestrator().run([path.join(root, 'a', 'shapes'), path.join(root, 'b', 'shapes')]);
    const [first, second] = report.groups;

    expect(first.folder).toBe(path.join(root, 'a', 'shapes'));
    expect(first.outcome).toBe('succeeded');
    expect(second.outcome).toBe('failed');
    expect(second.files[0].status).toBe('failed');
    expect(second.files[0].variants.map(variant => [variant.scale, variant.error?.tag, variant.error?.message])).toEqual(
      ['x1', 'x2', 'x3'].map(tag => [
        tag,
        'IOWriteError',
        `${ERROR_MESSAGES.OUTPUT_CLAIMED}: ${path.join(out, tag, 'shapes', 'rail.nl2mat')}`,
      ])
    );
    expect(report.summary.outputsWritten).toBe(3);
    expect(read('x2/shapes/rail.nl2mat')).toContain('<width>20.0</width>');
  });

  it('copies companion files whose names start with two dots', async () => {
    write('loose/rail.nl2mat', RAIL.replace('<map>rail.png</map>', '<map>..textures/rail.png</map>'));
    write('loose/..textures/rail.png', 'texture');
    write('loose/up.nl2mat', RAIL.replace('<map>rail.png</map>', '<map>../rail.png</map>'));

    const report = await orchestrator().run([path.join(root, 'loose', 'rail.nl2mat'), path.join(root, 'loose', 'up.nl2mat')]);
    const [rail, up] = report.groups[0].files;

    expect(rail.assets.map(asset => asset.status)).toEqual(['copied', 'copied', 'copied']);
    expect(read('x2/..textures/rail.png')).toBe('texture');
    expect(up.assets.map(asset => [asset.status, asset.message])).toEqual([
      ['missing', 'asset lies outside the scale directory'],
      ['missing', 'asset lies outside the scale directory'],
      ['missing', 'asset lies outside the scale directory'],
    ]);
  });

  it('points scaled object files at the suffixed material names', async () => {
    const templates = path.join(root, 'templates');
    fs.mkdirSync(templates);
    fs.writeFileSync(
      path.join(templates, 'material.xml'),
      fs.readFileSync(path.join(TEMPLATES, 'material.xml'), 'utf8').replace('<naming suffix=""/>', '<naming suffix="_{tag}"/>')
    );
    fs.copyFileSync(path.join(TEMPLATES, 'object.xml'), path.join(templates, 'object.xml'));
    write('shapes/track.nl2sco', TRACK);
    write('shapes/rail.nl2mat', RAIL);

    const suffixed = loadTemplates(templates, LoggerFactory.silent());
    const report = await orchestrator({ table: suffixed }).run([path.join(root, 'shapes')]);

    expect(report.groups[0].outcome).toBe('succeeded');
    expect(report.groups[0].incomplete).toBe(false);
    expect(read('x2/shapes/track.nl2sco')).toContain('<material>rail_x2.nl2mat</material>');
    expect(read('x2/shapes/rail_x2.nl2mat')).toContain('<width>20.0</width>');
    expect(fs.existsSync(path.join(out, 'x2', 'shapes', 'rail.nl2mat'))).toBe(false);
  });
});

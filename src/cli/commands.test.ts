import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { runCli, type CliOutput } from './commands';

function capture(): CliOutput & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    log: (message: string) => { out.push(message); },
    error: (message: string) => { err.push(message); },
  };
}

describe('runCli', () => {
  let dir: string;
  let store: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rehab-cli-'));
    store = path.join(dir, 'session_log.csv');
    // Engine and store lifecycle messages
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('lists injury types', () => {
    const io = capture();
    expect(runCli(['injuries'], io)).toBe(0);
    expect(io.out).toHaveLength(9);
    expect(io.out[0]).toBe('ACL - Anterior Cruciate Ligament');
  });

  it('assesses metrics from flags', () => {
    const io = capture();
    const code = runCli(['assess', '--injury', 'ACL', '--lsi', '92', '--pain', '1', '--rfd', '95', '--days-since-surgery', '180'], io);

    expect(code).toBe(0);
    const lines = io.out[0].split('\n');
    expect(lines[1]).toBe('Phase: Return to Sport');
    expect(lines).toContain('  Days since surgery: 180 d');
    expect(lines[lines.length - 1]).toBe('Alerts: none');
  });

  it('derives LSI from limb forces', () => {
    const io = capture();
    expect(runCli(['assess', '--injury', 'ACL', '--left', '480', '--right', '520', '--pain', '2'], io)).toBe(0);
    expect(io.out[0].split('\n')).toContain('  LSI: 92.3%');
  });

  it('reports every validation problem with exit code 1', () => {
    const io = capture();
    expect(runCli(['assess', '--injury', 'ACL', '--pain', '15'], io)).toBe(1);
    expect(io.err).toEqual(['Invalid metrics:\n  - LSI is required\n  - Pain must be between 0 and 10']);
    expect(io.out).toEqual([]);
  });

  it('rejects an unknown injury type', () => {
    const io = capture();
    expect(runCli(['assess', '--injury', 'Elbow', '--lsi', '90', '--pain', '1'], io)).toBe(1);
    expect(io.err[0].startsWith('Unsupported injury type "Elbow". Supported: ACL, Achilles')).toBe(true);
  });

  it('prints usage for unknown commands and flags', () => {
    const unknownCommand = capture();
    expect(runCli(['dance'], unknownCommand)).toBe(1);
    expect(unknownCommand.err[0].startsWith('Unknown command "dance"\n\nUsage: rehab <command> [flags]')).toBe(true);

    const unknownFlag = capture();
    expect(runCli(['assess', '--colour', 'red'], unknownFlag)).toBe(1);
    expect(unknownFlag.err[0]).toContain('Usage: rehab <command> [flags]');
  });

  it('requires --injury for assess', () => {
    const io = capture();
    expect(runCli(['assess', '--lsi', '90'], io)).toBe(1);
    expect(io.err[0].startsWith('--injury is required')).toBe(true);
  });

  it('logs sessions and summarizes history', () => {
    const log = (lsi: string, pain: string) =>
      runCli(['log', '--patient', 'P-001', '--injury', 'ACL', '--lsi', lsi, '--pain', pain, '--store', store], capture());

    expect(log('55', '8')).toBe(0);
    expect(log('76.5', '3')).toBe(0);

    const io = capture();
    expect(runCli(['history', '--patient', 'P-001', '--store', store], io)).toBe(0);
    const lines = io.out[0].split('\n');
    expect(lines[1]).toBe('Sessions: 2');
    expect(lines).toContain('LSI change: +21.5');
    expect(lines).toContain('Pain change: -5');
    expect(lines).toContain('Critical alerts: 1');
  });

  it('does not log a session that fails validation', () => {
    const io = capture();
    expect(runCli(['log', '--patient', 'P-001', '--injury', 'ACL', '--pain', '2', '--store', store], io)).toBe(1);
    expect(fs.existsSync(store)).toBe(false);
  });

  it('does not log a session with an infinite metric', () => {
    const io = capture();
    const code = runCli(
      ['log', '--patient', 'P-001', '--injury', 'ACL', '--lsi', '80', '--pain', '2', '--peak-force', 'Infinity', '--store', store],
      io
    );

    expect(code).toBe(1);
    expect(io.err).toEqual(['Invalid metrics:\n  - Peak force must be a finite number']);
    expect(fs.existsSync(store)).toBe(false);
  });

  it('writes the dashboard report', () => {
    runCli(['log', '--patient', 'P-001', '--injury', 'ACL', '--lsi', '70', '--pain', '3', '--store', store], capture());
    const out = path.join(dir, 'reports', 'p-001.html');

    const io = capture();
    expect(runCli(['report', '--patient', 'P-001', '--out', out, '--store', store], io)).toBe(0);
    expect(io.out).toEqual([`Dashboard written to ${out}`]);
    expect(fs.readFileSync(out, 'utf8')).toContain('<title>Rehab progress: P-001</title>');
  });

  it('searches exercises', () => {
    const io = capture();
    expect(runCli(['exercises', '--phase', 'Late', '--type', 'Plyometric'], io)).toBe(0);
    expect(io.out).toEqual([
      'Box Jump [ACL, Late, Plyometric] - Develop rate of force development',
      'Pogo Hops [Achilles, Late, Plyometric] - Tendon stiffness and elastic return',
      'Lateral Bound and Stick [Generic, Late, Plyometric] - Frontal plane power and landing control',
    ]);
  });

  it('writes the assessment page with --html', () => {
    const out = path.join(dir, 'assessments', 'acl.html');
    const io = capture();

    expect(runCli(['assess', '--injury', 'ACL', '--lsi', '92', '--pain', '1', '--rfd', '95', '--html', out], io)).toBe(0);
    expect(io.out[io.out.length - 1]).toBe(`Assessment written to ${out}`);
    const html = fs.readFileSync(out, 'utf8');
    expect(html).toContain('<title>ACL assessment</title>');
    expect(html).toContain('bg-emerald-600 text-white">Return to Sport</span>');
  });

  it('writes the validation problems to the --html page', () => {
    const out = path.join(dir, 'invalid.html');
    const io = capture();

    expect(runCli(['assess', '--injury', 'ACL', '--pain', '15', '--html', out], io)).toBe(1);
    expect(fs.readFileSync(out, 'utf8')).toContain('<li>LSI is required</li><li>Pain must be between 0 and 10</li>');
  });

  it('filters exercises by equipment', () => {
    const io = capture();
    expect(runCli(['exercises', '--equipment', 'band'], io)).toBe(0);
    expect(io.out).toEqual(['Band External Rotation [Rotator Cuff, Mid, Strength] - Cuff strength at side']);
  });

  it('adds an exercise to a catalog and finds it again', () => {
    const catalog = path.join(dir, 'exercises.json');
    fs.writeFileSync(catalog, '[]');
    const add = () => {
      const io = capture();
      const code = runCli([
        'add-exercise', '--catalog', catalog,
        '--injury', 'ACL', '--phase', 'Mid', '--name', 'Step Down', '--type', 'Strength',
        '--goal', 'Eccentric quadriceps control',
      ], io);
      return { code, io };
    };

    const first = add();
    expect(first.code).toBe(0);
    expect(first.io.out).toEqual([`Added Step Down (acl-step-down) to ${catalog}`]);

    const found = capture();
    expect(runCli(['exercises', '--catalog', catalog, '--equipment', 'None'], found)).toBe(0);
    expect(found.out).toEqual(['Step Down [ACL, Mid, Strength] - Eccentric quadriceps control']);

    const again = add();
    expect(again.code).toBe(1);
    expect(again.io.err).toEqual([
      'Error: Invalid exercise:\n  - id: Exercise id "acl-step-down" already exists\n  - name: Exercise "Step Down" already exists',
    ]);
  });

  it('requires a goal to add an exercise', () => {
    const io = capture();
    const code = runCli(['add-exercise', '--injury', 'ACL', '--phase', 'Mid', '--name', 'Step Down', '--type', 'Strength'], io);
    expect(code).toBe(1);
    expect(io.err[0].startsWith('--goal is required')).toBe(true);
  });

  it('rejects an unknown phase filter', () => {
    const io = capture();
    expect(runCli(['exercises', '--phase', 'Final'], io)).toBe(1);
    expect(io.err[0].startsWith('Unknown phase "Final"')).toBe(true);
  });
});

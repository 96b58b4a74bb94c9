/**
 * Progress Display Tests
 */

import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import ora from 'ora';
import { ProgressDisplay, success, warning, error } from '../progress.js';

const mockSpinner = vi.hoisted(() => ({
  start: vi.fn().mockReturnThis(),
  stop: vi.fn().mockReturnThis(),
  succeed: vi.fn().mockReturnThis(),
  fail: vi.fn().mockReturnThis(),
  text: '',
}));

// Mock ora
vi.mock('ora', () => ({
  default: vi.fn(() => mockSpinner),
}));

describe('ProgressDisplay', () => {
  let consoleSpy: ReturnType<typeof vi.spyOn>;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    mockSpinner.text = '';
  });

  afterEach(() => {
    consoleSpy.mockRestore();
    vi.clearAllMocks();
  });

  describe('startPhase', () => {
    it('should start a spinner labelled with phase and entity type', () => {
      const progress = new ProgressDisplay();
      progress.startPhase('extracting', 'testCase');

      expect(ora).toHaveBeenCalledWith({ text: '📤 Extracting test cases', color: 'cyan' });
      expect(mockSpinner.start).toHaveBeenCalledTimes(1);
    });

    it('should not pass a color when colors are disabled', () => {
      const progress = new ProgressDisplay({ noColor: true });
      progress.startPhase('loading', 'folder');

      expect(ora).toHaveBeenCalledWith({ text: '📥 Loading folders', color: undefined });
    });

    it('should keep the spinner across fixed-point rounds of one type', () => {
      const progress = new ProgressDisplay();
      progress.startPhase('transforming', 'folder');
      progress.startPhase('loading', 'folder');
      progress.startPhase('transforming', 'folder');

      expect(ora).toHaveBeenCalledTimes(1);
      expect(mockSpinner.text).toBe('🔄 Transforming folders');
    });

    it('should replace the spinner when the entity type changes', () => {
      const progress = new ProgressDisplay();
      progress.startPhase('loading', 'folder');
      progress.startPhase('extracting', 'testCycle');

      expect(mockSpinner.stop).toHaveBeenCalledTimes(1);
      expect(ora).toHaveBeenCalledTimes(2);
      expect(ora).toHaveBeenLastCalledWith({ text: '📤 Extracting test cycles', color: 'cyan' });
    });
  });

  describe('updateProgress', () => {
    it('should append running totals to the label', () => {
      const progress = new ProgressDisplay();
      progress.startPhase('extracting', 'folder');
      progress.updateProgress({ itemsStaged: 3, pagesFetched: 2 });

      expect(mockSpinner.text).toBe('📤 Extracting folders 3 staged, 2 page(s)');
    });

    it('should show failures only when there are some', () => {
      const progress = new ProgressDisplay();
      progress.startPhase('loading', 'testExecution');

      progress.updateProgress({ loaded: 4, failed: 0 });
      expect(mockSpinner.text).toBe('📥 Loading test executions 4 loaded');

      progress.updateProgress({ loaded: 4, failed: 1 });
      expect(mockSpinner.text).toBe('📥 Loading test executions 4 loaded, 1 failed');
    });

    it('should do nothing without a running spinner', () => {
      const progress = new ProgressDisplay();
      progress.updateProgress({ loaded: 1 });
      expect(mockSpinner.text).toBe('');
    });
  });

  describe('handleEvent', () => {
    it('should complete the spinner on type:complete', () => {
      const progress = new ProgressDisplay();
      progress.handleEvent({ type: 'phase:start', runId: 'run_1', phase: 'loading', entityType: 'folder' });
      progress.handleEvent({ type: 'type:complete', runId: 'run_1', entityType: 'folder' });

      expect(mockSpinner.succeed).toHaveBeenCalledWith(expect.stringMatching(/^📥 Loading folders \(\d+(ms|\.\ds)\)$/));
    });

    it('should route progress events to the spinner', () => {
      const progress = new ProgressDisplay();
      progress.handleEvent({ type: 'phase:start', runId: 'run_1', phase: 'extracting', entityType: 'folder' });
      progress.handleEvent({ type: 'progress', runId: 'run_1', entityType: 'folder', progress: { itemsStaged: 5 } });

      expect(mockSpinner.text).toBe('📤 Extracting folders 5 staged');
    });

    it('should fail the spinner on error', () => {
      const progress = new ProgressDisplay();
      progress.handleEvent({ type: 'phase:start', runId: 'run_1', phase: 'loading', entityType: 'testCase' });
      progress.handleEvent({ type: 'error', runId: 'run_1', error: new Error('boom') });

      expect(mockSpinner.fail).toHaveBeenCalledWith('Failed: boom');
    });

    it('should log checkpoints only in verbose mode', () => {
      const quiet = new ProgressDisplay();
      quiet.handleEvent({ type: 'checkpoint', runId: 'run_1', message: 'folder round 1' });
      expect(consoleSpy).not.toHaveBeenCalled();

      const verbose = new ProgressDisplay({ verbose: true });
      verbose.handleEvent({ type: 'checkpoint', runId: 'run_1', message: 'folder round 1' });
      expect(consoleSpy).toHaveBeenCalledWith('  ⟳ folder round 1');
    });
  });

  describe('log', () => {
    it('should pause a running spinner around the message', () => {
      const progress = new ProgressDisplay();
      progress.startPhase('loading', 'folder');
      progress.log('hello');

      expect(mockSpinner.stop).toHaveBeenCalledTimes(1);
      expect(consoleSpy).toHaveBeenCalledWith('hello');
      expect(mockSpinner.start).toHaveBeenCalledTimes(2);
    });
  });
});

describe('message helpers', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should prefix success and warning messages', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    success('done');
    warning('careful');
    expect(log).toHaveBeenNthCalledWith(1, '✓ done');
    expect(log).toHaveBeenNthCalledWith(2, '⚠ careful');
  });

  it('should write errors to stderr', () => {
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});
    error('broken');
    expect(err).toHaveBeenCalledWith('✗ broken');
  });
});

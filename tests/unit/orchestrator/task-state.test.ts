import {
  TASK_ID_PATTERN,
  advanceSubtask,
  appendRevision,
  completeSubtask,
  createTaskState,
  currentSubtask,
  generateTaskId,
  progressPercentage,
  recordError,
  setPlan,
  toStatusSummary,
} from '../../../src/orchestrator/task-state';

const T0 = new Date('2026-03-01T10:00:00.000Z');

describe('TaskState', () => {
  describe('createTaskState', () => {
    it('should start PENDING with empty plan and code', () => {
      const state = createTaskState('  make a window  ', { taskId: 'task_1', now: T0 });

      expect(state).toMatchObject({
        taskId: 'task_1',
        originalTask: 'make a window',
        status: 'PENDING',
        validationStatus: 'NOT_STARTED',
        subtasks: [],
        currentSubtaskIndex: 0,
        planExhausted: false,
        currentCode: '',
        createdAt: '2026-03-01T10:00:00.000Z',
        updatedAt: '2026-03-01T10:00:00.000Z',
      });
    });

    it('should reject an empty task description', () => {
      expect(() => createTaskState('   ')).toThrow(TypeError);
    });
  });

  describe('generateTaskId', () => {
    it('should match task_YYYYMMDD_HHMMSS_<8 hex> in local time', () => {
      const now = new Date(2026, 0, 5, 7, 8, 9);
      const id = generateTaskId(now);

      expect(id).toMatch(TASK_ID_PATTERN);
      expect(id.startsWith('task_20260105_070809_')).toBe(true);
    });

    it('should produce distinct ids within the same second', () => {
      const now = new Date();
      expect(generateTaskId(now)).not.toBe(generateTaskId(now));
    });
  });

  describe('history chain', () => {
    it('should link every revision to the previous one', () => {
      let state = setPlan(createTaskState('game', { now: T0 }), ['step one is here', 'step two is here']);
      state = appendRevision(state, { subtask: 'a', newCode: 'v1', modelUsed: 'm1' });
      state = appendRevision(state, { subtask: 'b', newCode: 'v2', modelUsed: 'm2' });
      state = appendRevision(state, { subtask: 'c', newCode: 'v3', modelUsed: 'm1' });

      expect(state.codeHistory.map((r) => [r.previousCode, r.newCode])).toEqual([
        ['', 'v1'],
        ['v1', 'v2'],
        ['v2', 'v3'],
      ]);
      expect(state.currentCode).toBe('v3');
      expect(state.modelsUsed).toEqual(['m1', 'm2']);
    });

    it('should leave the previous snapshot untouched', () => {
      const before = createTaskState('game', { now: T0 });
      const after = appendRevision(before, { subtask: 'a', newCode: 'v1', modelUsed: 'm' });

      expect(before.currentCode).toBe('');
      expect(before.codeHistory).toHaveLength(0);
      expect(after.codeHistory).toHaveLength(1);
    });
  });

  describe('setPlan', () => {
    it('should refuse to overwrite an existing plan', () => {
      const planned = setPlan(createTaskState('game'), ['first subtask text']);
      expect(() => setPlan(planned, ['other subtask text'])).toThrow('already set');
    });

    it('should mark an empty plan as exhausted', () => {
      const planned = setPlan(createTaskState('game'), []);
      expect(planned.planExhausted).toBe(true);
      expect(currentSubtask(planned)).toBe('');
    });
  });

  describe('recordError', () => {
    it('should keep only the last 500 characters of code context', () => {
      const code = 'a'.repeat(100) + 'b'.repeat(500);
      const state = recordError(createTaskState('game'), { type: 'name_error', description: 'x', codeContext: code });

      expect(state.errors[0]?.codeContext).toBe('b'.repeat(500));
      expect(state.errors[0]?.userFeedback).toBeUndefined();
    });
  });

  describe('progress', () => {
    it('should follow the current index and never decrease', () => {
      let state = setPlan(createTaskState('game'), ['one subtask text', 'two subtask text', 'three subtask text', 'four subtask text']);
      const seen = [progressPercentage(state)];
      for (let i = 0; i < 6; i++) {
        state = advanceSubtask(state);
        seen.push(progressPercentage(state));
      }

      expect(seen).toEqual([0, 25, 50, 75, 75, 75, 75]);
      expect(state.currentSubtaskIndex).toBe(3);
      expect(state.planExhausted).toBe(true);
    });

    it('should report index over plan length once every subtask is complete', () => {
      let state = setPlan(createTaskState('game'), ['one subtask text', 'two subtask text', 'three subtask text']);
      for (const newCode of ['a', 'b', 'c']) {
        state = completeSubtask(state, { newCode, modelUsed: 'coder-m', executionAttempted: true, executionSucceeded: true });
      }

      expect(state.currentSubtaskIndex).toBe(2);
      expect(progressPercentage(state)).toBeCloseTo(66.67, 2);
    });

    it('should report 0 with no plan', () => {
      expect(progressPercentage(createTaskState('game'))).toBe(0);
    });
  });

  describe('completeSubtask', () => {
    it('should append the revision, record errors with the new code, count the run and advance', () => {
      const planned = setPlan(createTaskState('game'), ['create the window', 'draw the player']);
      const next = completeSubtask(planned, {
        newCode: 'print(1)',
        modelUsed: 'coder',
        errors: [{ type: 'name_error', description: 'NameError: x', userFeedback: 'skip' }],
        executionAttempted: true,
        executionSucceeded: false,
      });

      expect(next.codeHistory[0]).toMatchObject({ subtask: 'create the window', previousCode: '', newCode: 'print(1)', modelUsed: 'coder' });
      expect(next.errors[0]).toMatchObject({ type: 'name_error', codeContext: 'print(1)', userFeedback: 'skip' });
      expect(next.metrics).toEqual({ executionsAttempted: 1, executionsSucceeded: 0, retrievalSearches: 0 });
      expect(currentSubtask(next)).toBe('draw the player');
    });
  });

  describe('toStatusSummary', () => {
    it('should summarize stage, progress and counts', () => {
      let state = setPlan(createTaskState('game', { taskId: 'task_x' }), ['create the window', 'draw the player']);
      state = completeSubtask(state, { newCode: 'abc', modelUsed: 'coder' });

      expect(toStatusSummary(state)).toMatchObject({
        taskId: 'task_x',
        stage: 'PENDING',
        validationStatus: 'NOT_STARTED',
        progressPercent: 50,
        currentSubtask: 'draw the player',
        subtaskIndex: 1,
        totalSubtasks: 2,
        errorCount: 0,
        codeLength: 3,
      });
    });
  });
});

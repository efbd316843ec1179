import { z } from 'zod';
import type { ActionIntent, Decision, ResolvedAction, Verdict } from '../types/index.js';
import type { ActionRecord } from '../memory/SessionLog.js';
import type { ErrorKind } from './errors.js';
import type { TokenUsage } from './token-tracker.js';

export type TaskMode = 'execute' | 'explore';

export const taskSchema = z.object({
  goal: z.string().trim().min(1, 'Task goal must not be empty').max(4000),
  mode: z.enum(['execute', 'explore']),
  /** App identity; knowledge is partitioned by it and crash detection uses it */
  app: z.string().trim().min(1).optional(),
  /** Launched during init when set */
  packageName: z.string().trim().min(1).optional(),
});

export type Task = Readonly<z.infer<typeof taskSchema>>;

export type SubGoalStatus = 'pending' | 'active' | 'done' | 'failed';

export interface SubGoal {
  description: string;
  status: SubGoalStatus;
  /** Texts whose presence on screen means the sub-goal is achieved */
  verifyText: string[];
}

export type SessionState = 'init' | 'planning' | 'round_loop' | 'reflecting' | 'terminating' | 'terminated';

export type SessionStatus = 'completed' | 'incomplete' | 'failed' | 'cancelled';

export interface SessionResult {
  sessionId: string;
  status: SessionStatus;
  kind?: ErrorKind;
  message: string;
  rounds: number;
  subGoals: SubGoal[];
  records: readonly ActionRecord[];
  tokenUsage: TokenUsage;
}

export interface Reflection {
  verdict: Verdict;
  description: string;
  /** The model asked to undo the action with a back press */
  pressBack: boolean;
}

export type SessionEvent =
  | { type: 'state'; state: SessionState; round: number }
  | { type: 'plan_created'; subGoals: string[] }
  | { type: 'round_started'; round: number; subGoal: string }
  | { type: 'decision'; round: number; decision: Decision }
  | { type: 'action'; round: number; intent: ActionIntent; action: ResolvedAction }
  | { type: 'verdict'; round: number; verdict: Verdict; description: string }
  | { type: 'subgoal_completed'; round: number; subGoal: string }
  | { type: 'failure'; round: number; kind: ErrorKind; message: string }
  | { type: 'done'; result: SessionResult };

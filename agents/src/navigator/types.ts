/**
 * Shared state of one navigator run. Every node reads it and returns the keys it fills.
 */

import type {
  CareerActionPlan,
  NavigatorStepName,
  NavigatorStepTrace,
  NavigatorTrace,
  ProfileFeedback,
  SkillAnalysis,
  TailoredResumeContent,
} from '@careernav/schemas';
import type { AgentLogSink } from '../shared/types.js';

export interface NavigatorState {
  student_profile: string;
  role_choice: string;
  chosen_career: string | null;
  market_analysis: SkillAnalysis | null;
  profile_analysis: ProfileFeedback | null;
  tailored_resume: TailoredResumeContent | null;
  final_plan: CareerActionPlan | null;
}

export type CompletedNavigatorState = {
  [K in keyof NavigatorState]: NonNullable<NavigatorState[K]>;
};

export interface NavigatorRunOptions {
  runId?: string;
  logSink?: AgentLogSink;
  onStepUpdate?: (step: NavigatorStepTrace, trace: NavigatorTrace) => void;
}

export interface NavigatorRunResult {
  state: CompletedNavigatorState;
  trace: NavigatorTrace;
}

export interface NavigatorNode {
  name: NavigatorStepName;
  dependsOn: NavigatorStepName[];
  run: (state: NavigatorState) => Promise<Partial<NavigatorState>>;
}

/** A node failed; the run stops. */
export class NavigatorStepError extends Error {
  constructor(
    readonly step: NavigatorStepName,
    message: string,
    readonly trace: NavigatorTrace,
  ) {
    super(`${step} failed: ${message}`);
    this.name = 'NavigatorStepError';
  }
}

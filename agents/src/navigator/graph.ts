/**
 * Navigator graph: the fixed set of agent nodes and the executor that runs them.
 *
 *   route ──► suggest_role? ──► analyze_market ──┬─► review_profile ──► create_final_plan
 *                                                └─► tailor_resume
 *
 * Nodes whose dependencies are finished run together; a skipped node counts as finished.
 * No retries: the first failing node stops the run with a NavigatorStepError.
 */

import {
  isStrategyChoice,
  type NavigatorStepName,
  type NavigatorStepTrace,
  type NavigatorTrace,
} from '@careernav/schemas';
import type { AgentContext, AgentResult } from '../shared/types.js';
import { RoleSuggesterAgent } from './role-suggester-agent.js';
import { MarketAnalystAgent } from './market-analyst-agent.js';
import { ProfileReviewerAgent } from './profile-reviewer-agent.js';
import { ResumeTailorAgent } from './resume-tailor-agent.js';
import { LeadStrategistAgent } from './lead-strategist-agent.js';
import {
  NavigatorStepError,
  type CompletedNavigatorState,
  type NavigatorNode,
  type NavigatorRunOptions,
  type NavigatorRunResult,
  type NavigatorState,
} from './types.js';

export function createInitialState(studentProfile: string, roleChoice: string): NavigatorState {
  return {
    student_profile: studentProfile,
    role_choice: roleChoice,
    chosen_career: isStrategyChoice(roleChoice) ? null : roleChoice,
    market_analysis: null,
    profile_analysis: null,
    tailored_resume: null,
    final_plan: null,
  };
}

/** Entry routing: strategies need a suggested role first. */
export function routeInitialChoice(state: NavigatorState): 'suggest_role' | 'analyze_market' {
  return isStrategyChoice(state.role_choice) ? 'suggest_role' : 'analyze_market';
}

function required<T>(value: T | null, key: keyof NavigatorState): T {
  if (value === null) {
    throw new Error(`State is missing ${key}`);
  }
  return value;
}

function unwrap<T>(result: AgentResult<T>): T {
  if (!result.success || result.data === undefined) {
    throw new Error(result.error ?? 'Agent returned no data');
  }
  return result.data;
}

/**
 * Build the node list. Agents are created per run because they keep per-execution logs.
 */
export function buildNavigatorNodes(context: Partial<AgentContext> = {}): NavigatorNode[] {
  const roleSuggester = new RoleSuggesterAgent();
  const marketAnalyst = new MarketAnalystAgent();
  const profileReviewer = new ProfileReviewerAgent();
  const resumeTailor = new ResumeTailorAgent();
  const leadStrategist = new LeadStrategistAgent();

  return [
    {
      name: 'route',
      dependsOn: [],
      run: async () => ({}),
    },
    {
      name: 'suggest_role',
      dependsOn: ['route'],
      run: async (state) => {
        const role = state.role_choice;
        if (!isStrategyChoice(role)) {
          throw new Error(`Role choice "${role}" is not a strategy`);
        }
        const suggestion = unwrap(
          await roleSuggester.execute(
            { student_profile: state.student_profile, strategy: role },
            context,
          ),
        );
        return { chosen_career: suggestion.chosen_career };
      },
    },
    {
      name: 'analyze_market',
      dependsOn: ['route', 'suggest_role'],
      run: async (state) => {
        const career = required(state.chosen_career, 'chosen_career');
        const analysis = unwrap(await marketAnalyst.execute({ career }, context));
        return { market_analysis: analysis };
      },
    },
    {
      name: 'review_profile',
      dependsOn: ['analyze_market'],
      run: async (state) => {
        const feedback = unwrap(
          await profileReviewer.execute(
            {
              student_profile: state.student_profile,
              skill_analysis: required(state.market_analysis, 'market_analysis'),
            },
            context,
          ),
        );
        return { profile_analysis: feedback };
      },
    },
    {
      name: 'tailor_resume',
      dependsOn: ['analyze_market'],
      run: async (state) => {
        const resume = unwrap(
          await resumeTailor.execute(
            {
              career: required(state.chosen_career, 'chosen_career'),
              skill_analysis: required(state.market_analysis, 'market_analysis'),
              student_profile: state.student_profile,
            },
            context,
          ),
        );
        return { tailored_resume: resume };
      },
    },
    {
      name: 'create_final_plan',
      dependsOn: ['review_profile'],
      run: async (state) => {
        const plan = unwrap(
          await leadStrategist.execute(
            {
              career: required(state.chosen_career, 'chosen_career'),
              skill_analysis: required(state.market_analysis, 'market_analysis'),
              profile_feedback: required(state.profile_analysis, 'profile_analysis'),
            },
            context,
          ),
        );
        return { final_plan: plan };
      },
    },
  ];
}

function patchStep(trace: NavigatorTrace, step: NavigatorStepTrace): NavigatorTrace {
  return {
    ...trace,
    steps: trace.steps.map((s) => (s.name === step.name ? step : s)),
  };
}

function completed(state: NavigatorState): CompletedNavigatorState {
  return {
    student_profile: state.student_profile,
    role_choice: state.role_choice,
    chosen_career: required(state.chosen_career, 'chosen_career'),
    market_analysis: required(state.market_analysis, 'market_analysis'),
    profile_analysis: required(state.profile_analysis, 'profile_analysis'),
    tailored_resume: required(state.tailored_resume, 'tailored_resume'),
    final_plan: required(state.final_plan, 'final_plan'),
  };
}

/**
 * Run a node list against an initial state. Exposed for custom graphs; the app uses runNavigator.
 */
export async function executeGraph(
  nodes: NavigatorNode[],
  initialState: NavigatorState,
  options: NavigatorRunOptions = {},
): Promise<{ state: NavigatorState; trace: NavigatorTrace }> {
  let state = { ...initialState };
  let trace: NavigatorTrace = {
    status: 'running',
    startedAt: new Date().toISOString(),
    steps: nodes.map((n) => ({ name: n.name, status: 'pending' })),
  };

  const finished = new Set<NavigatorStepName>();
  const update = (step: NavigatorStepTrace) => {
    trace = patchStep(trace, step);
    options.onStepUpdate?.(step, trace);
  };

  // a concrete role goes straight to the market analyst
  if (
    routeInitialChoice(state) === 'analyze_market' &&
    nodes.some((n) => n.name === 'suggest_role')
  ) {
    finished.add('suggest_role');
    update({ name: 'suggest_role', status: 'skipped' });
  }

  while (finished.size < nodes.length) {
    const ready = nodes.filter(
      (n) => !finished.has(n.name) && n.dependsOn.every((d) => finished.has(d)),
    );
    if (ready.length === 0) {
      throw new Error('Navigator graph has unreachable nodes');
    }

    const snapshot = state;
    const settled = await Promise.allSettled(
      ready.map(async (node) => {
        const startedAt = new Date().toISOString();
        update({ name: node.name, status: 'running', startedAt });
        try {
          const out = await node.run(snapshot);
          update({
            name: node.name,
            status: 'completed',
            startedAt,
            completedAt: new Date().toISOString(),
          });
          return out;
        } catch (err) {
          update({
            name: node.name,
            status: 'failed',
            startedAt,
            completedAt: new Date().toISOString(),
            error: err instanceof Error ? err.message : String(err),
          });
          throw err;
        }
      }),
    );

    for (const [i, outcome] of settled.entries()) {
      const node = ready[i];
      if (outcome.status === 'rejected') {
        const message =
          outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
        trace = { ...trace, status: 'failed', completedAt: new Date().toISOString() };
        throw new NavigatorStepError(node.name, message, trace);
      }
      state = { ...state, ...outcome.value };
      finished.add(node.name);
    }
  }

  trace = { ...trace, status: 'completed', completedAt: new Date().toISOString() };
  return { state, trace };
}

/**
 * Run the full navigator for one student. Throws NavigatorStepError when a node fails.
 */
export async function runNavigator(
  studentProfile: string,
  roleChoice: string,
  options: NavigatorRunOptions = {},
): Promise<NavigatorRunResult> {
  const nodes = buildNavigatorNodes({ runId: options.runId, logSink: options.logSink });
  const { state, trace } = await executeGraph(
    nodes,
    createInitialState(studentProfile, roleChoice.trim()),
    options,
  );
  return { state: completed(state), trace };
}

/**
 * Step execution logic
 *
 * Runs the actions of a parsed tutorial strictly in document order. After an
 * action fails or errors, the run halts unless that action allows
 * continue-on-error; the remaining actions are reported as skipped.
 */

import type { Action, Step, Tutorial } from '../dsl/index.js';
import type { Sandbox } from '../sandbox/index.js';
import { LocalSandbox } from '../sandbox/local.js';
import { VariableStore } from '../variables/index.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { runAction } from './actions.js';
import type { ActionResult, ExecutionContext } from './actions.js';

/**
 * Terminal outcome of one action
 */
export interface ActionOutcome extends ActionResult {
  stepId: string;
  stepTitle: string;
  /** Position of the action within its step */
  actionIndex: number;
  action: Action;
  durationMs: number;
}

/**
 * Result of executing a tutorial
 */
export interface RunReport {
  /** Tutorial title */
  title: string;
  /** Where the tutorial was read from */
  source: string;
  /** Workspace root path */
  workspaceRoot: string;
  /** One outcome per action, in document order */
  outcomes: ActionOutcome[];
  /** False when the run halted on a failure */
  success: boolean;
  /** Variables at the end of the run */
  variables: Record<string, string>;
}

/**
 * Callbacks to follow a run while it happens
 */
export interface ExecutorHooks {
  onStepStart?(step: Step, stepIndex: number): void;
  onActionStart?(step: Step, action: Action, actionIndex: number): void;
  onActionEnd?(outcome: ActionOutcome): void;
}

export interface ExecutorOptions {
  /** Where commands run and files land (default: a temporary LocalSandbox) */
  sandbox?: Sandbox;
  /** Let file actions write outside the workspace root */
  allowUnsafePaths?: boolean;
  /** Create missing parent directories for file actions and out-file */
  createParentDirs?: boolean;
  /** Initial variables, or a store to share */
  variables?: VariableStore | Record<string, string>;
  /** Extra environment variables for every command */
  env?: Record<string, string>;
  logger?: Logger;
  hooks?: ExecutorHooks;
}

/**
 * Executes a parsed tutorial
 */
export class TutorialExecutor {
  private tutorial: Tutorial;
  private sandbox: Sandbox;
  private variables: VariableStore;
  private logger: Logger;
  private hooks: ExecutorHooks;
  private options: ExecutorOptions;

  constructor(tutorial: Tutorial, options: ExecutorOptions = {}) {
    this.tutorial = tutorial;
    this.options = options;
    this.logger = options.logger ?? silentLogger;
    this.hooks = options.hooks ?? {};
    this.sandbox = options.sandbox ?? new LocalSandbox({ tutorialId: tutorial.title, logger: this.logger });
    this.variables = options.variables instanceof VariableStore
      ? options.variables
      : new VariableStore(options.variables);
  }

  /**
   * Variables of this run
   */
  getVariables(): VariableStore {
    return this.variables;
  }

  /**
   * Execute all steps in the tutorial
   */
  async execute(): Promise<RunReport> {
    await this.sandbox.initialize();

    const workspaceRoot = this.sandbox.getWorkspaceRoot();
    const context: ExecutionContext = {
      sandbox: this.sandbox,
      variables: this.variables,
      workspaceRoot,
      allowUnsafePaths: this.options.allowUnsafePaths ?? false,
      createParentDirs: this.options.createParentDirs ?? false,
      env: this.options.env ?? {},
      logger: this.logger,
    };

    const steps = this.tutorial.steps;
    const outcomes: ActionOutcome[] = [];
    let haltedBy: ActionOutcome | undefined;

    this.logger.debug(`Workspace: ${workspaceRoot}`);

    for (const [stepIndex, step] of steps.entries()) {
      if (!haltedBy) {
        this.logger.info(`Step ${stepIndex + 1}/${steps.length}: ${step.title}`);
        this.hooks.onStepStart?.(step, stepIndex);
      }

      for (const [actionIndex, action] of step.actions.entries()) {
        const base = { stepId: step.id, stepTitle: step.title, actionIndex, action };

        if (haltedBy) {
          this.record(outcomes, {
            ...base,
            status: 'skipped',
            reason: 'halted',
            message: `Not run: halted after ${haltedBy.status} action ${haltedBy.actionIndex + 1} of step "${haltedBy.stepId}"`,
            durationMs: 0,
          });
          continue;
        }

        this.hooks.onActionStart?.(step, action, actionIndex);
        const startedAt = Date.now();
        const result = await runAction(action, context);
        const outcome = this.record(outcomes, { ...base, ...result, durationMs: Date.now() - startedAt });

        if (outcome.status === 'failed' || outcome.status === 'errored') {
          this.logger.warn(`${label(step, actionIndex, action)} ${outcome.status}: ${outcome.message}`);
          if (action.continueOnError) {
            this.logger.info('Continuing (continue-on-error=true)');
          } else {
            haltedBy = outcome;
          }
        } else {
          this.logger.debug(`${label(step, actionIndex, action)} ${outcome.status}: ${outcome.message}`);
        }
      }
    }

    if (haltedBy) {
      this.logger.warn(`Run halted at step "${haltedBy.stepId}" (line ${haltedBy.action.line})`);
    }

    return {
      title: this.tutorial.title,
      source: this.tutorial.source,
      workspaceRoot,
      outcomes,
      success: haltedBy === undefined,
      variables: this.variables.snapshot(),
    };
  }

  /**
   * Cleanup the sandbox
   */
  async cleanup(keepWorkspace?: boolean): Promise<void> {
    await this.sandbox.cleanup(keepWorkspace);
  }

  private record(outcomes: ActionOutcome[], outcome: ActionOutcome): ActionOutcome {
    outcomes.push(outcome);
    this.hooks.onActionEnd?.(outcome);
    return outcome;
  }
}

function label(step: Step, actionIndex: number, action: Action): string {
  return `[${step.id}#${actionIndex + 1}] ${action.kind} (line ${action.line})`;
}

export * from './actions.js';

import { describeError, logEvent } from "./logger"

// A failed `required` step aborts the workflow.
export type StepPolicy = "required" | "best-effort"

export type WorkflowStep = {
	name: string
	policy: StepPolicy
}

export type StepResult<T> = { ok: true; value: T } | { ok: false; error: unknown }

export async function runStep<T>(step: WorkflowStep, action: () => Promise<T>): Promise<StepResult<T>> {
	try {
		return { ok: true, value: await action() }
	} catch (error) {
		logEvent("workflow_step_failed", { step: step.name, policy: step.policy, error: describeError(error) })
		return { ok: false, error }
	}
}

import type {
    RunStatus,
    StepError,
    StepPhase,
    StepStatus,
} from "../types.js"

export type StepwrightEvent =
    | {
          type: "run:start"
          runId: string
          workflowName: string
          totalSteps: number
          resumedFrom?: string
      }
    | {
          type: "run:complete"
          runId: string
          status: RunStatus
          duration: number
      }
    | {
          type: "step:start"
          runId: string
          stepIndex: number
          stepId: string
          stepType: string
          agent: string
          attempt: number
          phase: StepPhase
      }
    | {
          type: "step:complete"
          runId: string
          stepIndex: number
          stepId: string
          status: StepStatus
          duration: number
          error?: StepError
      }
    | {
          type: "step:retry"
          runId: string
          stepIndex: number
          stepId: string
          attempt: number
          maxRetries: number
          reason: string
      }
    | {
          type: "step:skipped"
          runId: string
          stepIndex: number
          stepId: string
      }
    | {
          type: "review:start"
          runId: string
          stepIndex: number
          reviewType: string
          cycle: number
      }
    | {
          type: "review:complete"
          runId: string
          stepIndex: number
          reviewType: string
          approved: boolean
          issueCount: number
          requiredFixCount: number
      }
    | {
          type: "remediation:start"
          runId: string
          stepIndex: number
          cycle: number
          maxCycles: number
          fixCount: number
      }
    | {
          type: "run:aborted"
          runId: string
          stepIndex: number
      }

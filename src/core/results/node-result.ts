// SPDX-License-Identifier: Apache-2.0

export enum ResultStatus {
  Ok = 'ok',
  Failed = 'failed',
  /** not attempted because a stage it depends on failed */
  Skipped = 'skipped',
}

/** Outcome of one stage for one target (a node, or a shared resource such as the firewall) */
export interface NodeResult {
  target: string;
  stage: string;
  status: ResultStatus;
  reason: string;
  /** class name of the error behind a failure */
  errorKind?: string;
}

export class NodeResults {
  private constructor() {}

  public static ok(target: string, stage: string, reason = ''): NodeResult {
    return {target, stage, status: ResultStatus.Ok, reason};
  }

  public static failed(target: string, stage: string, error: unknown): NodeResult {
    return {
      target,
      stage,
      status: ResultStatus.Failed,
      reason: error instanceof Error ? error.message : String(error),
      errorKind: error instanceof Error ? error.constructor.name : typeof error,
    };
  }

  public static skipped(target: string, stage: string, reason: string): NodeResult {
    return {target, stage, status: ResultStatus.Skipped, reason};
  }

  /** Every result that is not Ok */
  public static failures(results: readonly NodeResult[]): NodeResult[] {
    return results.filter(result => result.status !== ResultStatus.Ok);
  }
}

// SPDX-License-Identifier: Apache-2.0

import {type Stage} from './stage.js';
import {type NodeResult, NodeResults} from '../results/node-result.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

/**
 * Orders stages by their `dependsOn` edges into waves: each wave holds the stages whose dependencies all ran in an
 * earlier wave. Stages of one wave run concurrently.
 */
export class StageScheduler<C> {
  public readonly waves: ReadonlyArray<readonly Stage<C>[]>;

  /**
   * @throws IllegalArgumentError on duplicate names, unknown dependencies or a dependency cycle
   */
  public constructor(stages: readonly Stage<C>[]) {
    this.waves = StageScheduler.plan(stages);
  }

  /**
   * Runs every wave to completion. A stage that throws is reported as one failed result under its own name, and the
   * stages depending on it, directly or not, are reported as skipped without running.
   */
  public async run(context: C, onStage?: (stage: Stage<C>) => void): Promise<NodeResult[]> {
    const results: NodeResult[] = [];
    const broken = new Set<string>();
    for (const wave of this.waves) {
      const blockers = new Map<string, string>();
      for (const stage of wave) {
        const blocker = stage.dependsOn.find(dependency => broken.has(dependency));
        if (blocker !== undefined) {
          blockers.set(stage.name, blocker);
        }
      }

      const outcomes = await Promise.allSettled(
        wave.map(async stage => {
          if (blockers.has(stage.name)) {
            return [];
          }
          onStage?.(stage);
          return stage.run(context);
        }),
      );

      for (const [index, outcome] of outcomes.entries()) {
        const stage = wave[index];
        const blocker = blockers.get(stage.name);
        if (blocker !== undefined) {
          broken.add(stage.name);
          results.push(NodeResults.skipped(stage.name, stage.name, `stage '${blocker}' did not complete`));
        } else if (outcome.status === 'fulfilled') {
          results.push(...outcome.value);
        } else {
          broken.add(stage.name);
          results.push(NodeResults.failed(stage.name, stage.name, outcome.reason));
        }
      }
    }
    return results;
  }

  private static plan<C>(stages: readonly Stage<C>[]): Stage<C>[][] {
    const byName = new Map<string, Stage<C>>();
    for (const stage of stages) {
      if (byName.has(stage.name)) {
        throw new IllegalArgumentError(`duplicate stage: ${stage.name}`, stage.name);
      }
      byName.set(stage.name, stage);
    }

    for (const stage of stages) {
      for (const dependency of stage.dependsOn) {
        if (!byName.has(dependency)) {
          throw new IllegalArgumentError(`stage '${stage.name}' depends on unknown stage '${dependency}'`, dependency);
        }
      }
    }

    const done = new Set<string>();
    const waves: Stage<C>[][] = [];
    let remaining = [...stages];
    while (remaining.length > 0) {
      const wave = remaining.filter(stage => stage.dependsOn.every(dependency => done.has(dependency)));
      if (wave.length === 0) {
        throw new IllegalArgumentError(
          `stage dependency cycle among: ${remaining.map(stage => stage.name).join(', ')}`,
          remaining.map(stage => stage.name),
        );
      }

      for (const stage of wave) {
        done.add(stage.name);
      }
      waves.push(wave);
      remaining = remaining.filter(stage => !done.has(stage.name));
    }
    return waves;
  }
}

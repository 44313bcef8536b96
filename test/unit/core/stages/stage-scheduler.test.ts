// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {StageScheduler} from '../../../../src/core/stages/stage-scheduler.js';
import {type Stage} from '../../../../src/core/stages/stage.js';
import {NodeResults, ResultStatus} from '../../../../src/core/results/node-result.js';
import {sleep} from '../../../../src/core/helpers.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';

function stage(name: string, dependsOn: string[], log: string[] = []): Stage<string> {
  return {
    name,
    dependsOn,
    run: async context => {
      log.push(`${name}:${context}`);
      return [NodeResults.ok(name, name, context)];
    },
  };
}

describe('StageScheduler', () => {
  it('groups stages into dependency waves', () => {
    const scheduler = new StageScheduler([
      stage('app', ['infra', 'access']),
      stage('infra', []),
      stage('access', []),
    ]);

    expect(scheduler.waves.map(wave => wave.map(s => s.name))).to.deep.equal([['infra', 'access'], ['app']]);
  });

  it('runs waves in order and concatenates their results', async () => {
    const log: string[] = [];
    const scheduler = new StageScheduler([stage('app', ['infra'], log), stage('infra', [], log)]);

    const results = await scheduler.run('ctx');

    expect(log).to.deep.equal(['infra:ctx', 'app:ctx']);
    expect(results.map(result => result.stage)).to.deep.equal(['infra', 'app']);
  });

  it('reports every stage it starts', async () => {
    const started: string[] = [];
    await new StageScheduler([stage('a', []), stage('b', ['a'])]).run('ctx', s => started.push(s.name));

    expect(started).to.deep.equal(['a', 'b']);
  });

  it('rejects a dependency cycle', () => {
    expect(() => new StageScheduler([stage('a', ['b']), stage('b', ['a']), stage('c', [])])).to.throw(
      IllegalArgumentError,
      'stage dependency cycle among: a, b',
    );
  });

  it('rejects unknown dependencies and duplicate names', () => {
    expect(() => new StageScheduler([stage('app', ['infra'])])).to.throw(
      IllegalArgumentError,
      "stage 'app' depends on unknown stage 'infra'",
    );
    expect(() => new StageScheduler([stage('a', []), stage('a', [])])).to.throw(IllegalArgumentError, 'duplicate stage: a');
  });

  it('fails a stage that throws, lets its wave finish and skips its dependents', async () => {
    const log: string[] = [];
    let infraFinished = false;
    const access: Stage<string> = {
      name: 'access',
      dependsOn: [],
      run: async () => {
        throw new Error('ssh key unreadable');
      },
    };
    const infra: Stage<string> = {
      name: 'infra',
      dependsOn: [],
      run: async () => {
        await sleep(20);
        infraFinished = true;
        return [NodeResults.ok('val-one', 'infra'), NodeResults.ok('val-two', 'infra')];
      },
    };
    const started: string[] = [];

    const results = await new StageScheduler([
      access,
      infra,
      stage('app', ['access', 'infra'], log),
      stage('report', ['app'], log),
    ]).run('ctx', s => started.push(s.name));

    expect(infraFinished).to.be.true;
    expect(started).to.deep.equal(['access', 'infra']);
    expect(log).to.deep.equal([]);
    expect(results).to.deep.equal([
      {target: 'access', stage: 'access', status: ResultStatus.Failed, reason: 'ssh key unreadable', errorKind: 'Error'},
      {target: 'val-one', stage: 'infra', status: ResultStatus.Ok, reason: ''},
      {target: 'val-two', stage: 'infra', status: ResultStatus.Ok, reason: ''},
      {target: 'app', stage: 'app', status: ResultStatus.Skipped, reason: "stage 'access' did not complete"},
      {target: 'report', stage: 'report', status: ResultStatus.Skipped, reason: "stage 'app' did not complete"},
    ]);
  });

  it('keeps running stages whose dependencies only returned failed targets', async () => {
    const log: string[] = [];
    const infra: Stage<string> = {
      name: 'infra',
      dependsOn: [],
      run: async () => [NodeResults.failed('val-one', 'infra', new Error('quota exceeded'))],
    };

    const results = await new StageScheduler([infra, stage('app', ['infra'], log)]).run('ctx');

    expect(log).to.deep.equal(['app:ctx']);
    expect(results.map(result => result.status)).to.deep.equal([ResultStatus.Failed, ResultStatus.Ok]);
  });
});

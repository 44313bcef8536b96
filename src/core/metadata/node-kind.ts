// SPDX-License-Identifier: Apache-2.0

export enum NodeKind {
  Validator = 'validator',
  Boot = 'boot',
}

/** Boot nodes are provisioned and started before validators */
export const NODE_KIND_ORDER: readonly NodeKind[] = [NodeKind.Boot, NodeKind.Validator];

// SPDX-License-Identifier: Apache-2.0

import {color, type ListrLogger, PRESET_TIMER} from 'listr2';
import os from 'node:os';
import {PathEx} from './util/path-ex.js';

// -------------------- deploynet home ------------------------------------------------------------------------------
export const DEPLOYNET_HOME_DIR = process.env.DEPLOYNET_HOME || PathEx.join(os.homedir(), '.deploynet');
export const DEPLOYNET_KEYS_DIR = PathEx.join(DEPLOYNET_HOME_DIR, 'keys');

// -------------------- desired state inputs ------------------------------------------------------------------------
export const DEFAULT_NETWORK_CONFIG_DIR = 'network-config';
export const VALIDATORS_FILE = 'validators.json';
export const BOOT_NODES_FILE = 'boot_nodes.json';
export const DEFAULT_VALIDATORS_DIR = 'validators';
export const DEFAULT_BOOT_NODES_DIR = 'boot_nodes';
export const VALIDATOR_RUN_CONFIG_FILES = ['run_validator.yaml', 'run.yaml'];
export const BOOT_RUN_CONFIG_FILE = 'run_boot.yaml';
export const BOOT_NODE_RUN_CONFIG_FILE = 'run.yaml';
export const BOOT_IDENTITY_FILE = 'id_boot.json';
export const DEFAULT_NETWORK_NAME = 'testnet';

// -------------------- state store ---------------------------------------------------------------------------------
export const DEFAULT_STATE_FILE = '.deployed-state.json';

// -------------------- cloud ---------------------------------------------------------------------------------------
export const DEFAULT_RESOURCE_PREFIX = 'deploynet';
export const MANAGED_LABEL = 'deploynet-managed';
export const TEAM_LABEL = 'deploynet-team';
export const NODE_LABEL = 'deploynet-node';
export const DEFAULT_VALIDATOR_MACHINE_TYPE = 'e2-standard-4';
export const DEFAULT_BOOT_MACHINE_TYPE = 'e2-medium';
export const DEFAULT_SOURCE_IMAGE = 'projects/ubuntu-os-cloud/global/images/family/ubuntu-2204-lts';
export const DEFAULT_BOOT_DISK_GB = 20;
export const DEFAULT_DATA_DISK_TYPE = 'pd-standard';
export const DATA_DISK_SUFFIX = '-db';
export const FIREWALL_P2P_SUFFIX = '-p2p';
export const FIREWALL_SSH_SUFFIX = '-ssh';
export const SSH_PORT = 22;

export const IP_POLL_MAX_ATTEMPTS = +(process.env.DEPLOYNET_IP_POLL_MAX_ATTEMPTS ?? 12);
export const IP_POLL_BASE_DELAY_MS = +(process.env.DEPLOYNET_IP_POLL_BASE_DELAY_MS ?? 2000);
export const IP_POLL_MAX_DELAY_MS = 30_000;
export const OPERATION_POLL_MAX_ATTEMPTS = 60;

// -------------------- hosts ---------------------------------------------------------------------------------------
export const DEFAULT_SSH_USER = process.env.USER || 'deploynet';
export const SSH_READY_MAX_ATTEMPTS = 20;
export const SSH_READY_DELAY_MS = 3000;
export const DISK_DEVICE_PREFIX = '/dev/disk/by-id/google-';
export const DISK_MOUNT_ROOT = '/mnt/disks';
export const REMOTE_IDENTITY_DIR = '.deploynet';
export const CONTAINER_RESTART_POLICY = 'unless-stopped';

// ------------------- listr renderer -------------------------------------------------------------------------------
export const LISTR_DEFAULT_RENDERER_TIMER_OPTION = {
  ...PRESET_TIMER,
  condition: (duration: number) => duration > 100,
  format: (duration: number) => {
    if (duration > 10_000) {
      return color.red;
    }

    return color.green;
  },
};

export const LISTR_DEFAULT_RENDERER_OPTION: {
  collapseSubtasks: boolean;
  timer: typeof LISTR_DEFAULT_RENDERER_TIMER_OPTION;
  logger?: ListrLogger;
} = {
  collapseSubtasks: false,
  timer: LISTR_DEFAULT_RENDERER_TIMER_OPTION,
};

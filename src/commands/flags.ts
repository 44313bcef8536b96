// SPDX-License-Identifier: Apache-2.0

import * as constants from '../core/constants.js';
import {type CommandFlag} from '../types/flag-types.js';
import {type ArgvStruct, type Yargs} from '../types/aliases.js';
import {PathEx} from '../core/util/path-ex.js';
import {PeerAddressFormat} from '../core/app/peer-address-format.js';
import {ProviderName} from '../integration/cloud/provider-name.js';

export class Flags {
  /**
   * Set flag from the flag option
   * @param y instance of yargs
   * @param commandFlags a set of command flags
   */
  public static setCommandFlags(y: Yargs, ...commandFlags: CommandFlag[]): Yargs {
    for (const flag of commandFlags) {
      y.option(flag.name, Flags.toOption(flag));
    }
    return y;
  }

  public static setRequiredCommandFlags(y: Yargs, ...commandFlags: CommandFlag[]): Yargs {
    for (const flag of commandFlags) {
      y.option(flag.name, {...Flags.toOption(flag), demandOption: true});
    }
    return y;
  }

  /**
   * Optional flags are registered without their default, so that ConfigManager can tell a user supplied value from a
   * cached or default one.
   */
  public static setOptionalCommandFlags(y: Yargs, ...commandFlags: CommandFlag[]): Yargs {
    for (const flag of commandFlags) {
      y.option(flag.name, {...Flags.toOption(flag), default: undefined});
    }
    return y;
  }

  private static toOption(flag: CommandFlag) {
    const {describe, alias, type, choices, defaultValue} = flag.definition;
    const defaultDescription: string | undefined =
      defaultValue === undefined || defaultValue === '' ? undefined : `${flag.definition.dataMask ?? defaultValue}`;
    return {describe, alias, type, choices, defaultDescription};
  }

  public static readonly devMode: CommandFlag = {
    constName: 'devMode',
    name: 'dev',
    definition: {
      describe: 'Enable developer mode',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly quiet: CommandFlag = {
    constName: 'quiet',
    name: 'quiet-mode',
    definition: {
      describe: 'Quiet mode, do not render task progress',
      defaultValue: false,
      alias: 'q',
      type: 'boolean',
    },
  };

  public static readonly provider: CommandFlag = {
    constName: 'provider',
    name: 'provider',
    definition: {
      describe: 'Cloud provider hosting the network',
      defaultValue: ProviderName.Gcp,
      type: 'string',
      choices: Object.values(ProviderName),
    },
  };

  public static readonly project: CommandFlag = {
    constName: 'project',
    name: 'project',
    definition: {
      describe: 'Cloud project id (defaults to $GCP_PROJECT)',
      defaultValue: process.env.GCP_PROJECT ?? '',
      type: 'string',
    },
  };

  public static readonly zone: CommandFlag = {
    constName: 'zone',
    name: 'zone',
    definition: {
      describe: 'Cloud zone (defaults to $GCP_ZONE)',
      defaultValue: process.env.GCP_ZONE ?? '',
      type: 'string',
    },
  };

  public static readonly credentials: CommandFlag = {
    constName: 'credentials',
    name: 'credentials',
    definition: {
      describe: 'Service account key file (defaults to $GOOGLE_APPLICATION_CREDENTIALS)',
      defaultValue: process.env.GOOGLE_APPLICATION_CREDENTIALS ?? '',
      type: 'string',
      dataMask: '***',
    },
  };

  public static readonly networkConfigDirectory: CommandFlag = {
    constName: 'networkConfigDirectory',
    name: 'network-config-dir',
    definition: {
      describe: 'Directory containing validators.json and boot_nodes.json',
      defaultValue: constants.DEFAULT_NETWORK_CONFIG_DIR,
      type: 'string',
    },
  };

  public static readonly validatorsDirectory: CommandFlag = {
    constName: 'validatorsDirectory',
    name: 'validators-dir',
    definition: {
      describe: 'Directory holding per-team run configs and identity files',
      defaultValue: constants.DEFAULT_VALIDATORS_DIR,
      type: 'string',
    },
  };

  public static readonly bootNodesDirectory: CommandFlag = {
    constName: 'bootNodesDirectory',
    name: 'boot-nodes-dir',
    definition: {
      describe: 'Directory holding per-team boot node run configs',
      defaultValue: constants.DEFAULT_BOOT_NODES_DIR,
      type: 'string',
    },
  };

  public static readonly stateFile: CommandFlag = {
    constName: 'stateFile',
    name: 'state-file',
    definition: {
      describe: 'Deployed state cache file',
      defaultValue: constants.DEFAULT_STATE_FILE,
      type: 'string',
    },
  };

  public static readonly resourcePrefix: CommandFlag = {
    constName: 'resourcePrefix',
    name: 'prefix',
    definition: {
      describe: 'Prefix of shared cloud resources such as firewall rules',
      defaultValue: constants.DEFAULT_RESOURCE_PREFIX,
      type: 'string',
    },
  };

  public static readonly network: CommandFlag = {
    constName: 'network',
    name: 'network',
    definition: {
      describe: 'Network name handed to node commands',
      defaultValue: constants.DEFAULT_NETWORK_NAME,
      type: 'string',
    },
  };

  public static readonly peerAddressFormat: CommandFlag = {
    constName: 'peerAddressFormat',
    name: 'peer-address-format',
    definition: {
      describe: 'Format of peer and bootstrap addresses',
      defaultValue: PeerAddressFormat.Multiaddr,
      type: 'string',
      choices: Object.values(PeerAddressFormat),
    },
  };

  public static readonly concurrency: CommandFlag = {
    constName: 'concurrency',
    name: 'concurrency',
    definition: {
      describe: 'Maximum nodes processed at once within a stage (0 = unbounded)',
      defaultValue: 0,
      type: 'number',
    },
  };

  public static readonly sshUser: CommandFlag = {
    constName: 'sshUser',
    name: 'ssh-user',
    definition: {
      describe: 'User for SSH sessions to the VMs',
      defaultValue: constants.DEFAULT_SSH_USER,
      type: 'string',
    },
  };

  public static readonly sshKey: CommandFlag = {
    constName: 'sshKey',
    name: 'ssh-key',
    definition: {
      describe: 'Private key for SSH sessions, generated when missing',
      defaultValue: PathEx.join(constants.DEPLOYNET_KEYS_DIR, 'id_ed25519'),
      type: 'string',
    },
  };

  public static readonly allFlags: CommandFlag[] = [
    Flags.bootNodesDirectory,
    Flags.concurrency,
    Flags.credentials,
    Flags.devMode,
    Flags.network,
    Flags.networkConfigDirectory,
    Flags.peerAddressFormat,
    Flags.project,
    Flags.provider,
    Flags.quiet,
    Flags.resourcePrefix,
    Flags.sshKey,
    Flags.sshUser,
    Flags.stateFile,
    Flags.validatorsDirectory,
    Flags.zone,
  ];

  public static readonly allFlagsMap = new Map(Flags.allFlags.map(f => [f.name, f]));

  /** Renders the user supplied, non-default flags of a command line, masking secrets */
  public static stringifyArgv(argv: ArgvStruct): string {
    const processedFlags: string[] = [];

    for (const [name, value] of Object.entries(argv)) {
      const flag = Flags.allFlagsMap.get(name);
      if (!flag || value === undefined || value === flag.definition.defaultValue) {
        continue;
      }

      if (value === true) {
        processedFlags.push(`--${flag.name}`);
      } else if (flag.definition.dataMask) {
        processedFlags.push(`--${flag.name} ${flag.definition.dataMask}`);
      } else {
        processedFlags.push(`--${flag.name} ${value}`);
      }
    }

    return processedFlags.join(' ');
  }
}

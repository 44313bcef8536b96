// SPDX-License-Identifier: Apache-2.0

export interface PortPublication {
  host: number;
  container: number;
  protocol: 'tcp' | 'udp';
}

/** Everything needed to (re)create a node's container */
export interface ContainerSpec {
  /** reserved container name; an existing container with this name is replaced */
  name: string;
  image: string;
  cmd: string[];
  env: Record<string, string>;
  /** `hostPath:containerPath[:ro]` */
  binds: string[];
  ports: PortPublication[];
  networkMode: 'host' | 'bridge';
  restartPolicy: string;
  labels: Record<string, string>;
}

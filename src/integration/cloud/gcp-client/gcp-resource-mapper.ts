// SPDX-License-Identifier: Apache-2.0

import {type protos} from '@google-cloud/compute';
import {type Instance, InstanceStatus} from '../resources/instance/instance.js';
import {type Disk} from '../resources/disk/disk.js';
import {type FirewallRule} from '../resources/firewall/firewall-rule.js';
import {type TransportPort} from '../../../core/metadata/multiaddr.js';
import {isValidEnum} from '../../../core/util/validation-helpers.js';

type GcpInstance = protos.google.cloud.compute.v1.IInstance;
type GcpDisk = protos.google.cloud.compute.v1.IDisk;
type GcpFirewall = protos.google.cloud.compute.v1.IFirewall;
type GcpAllowed = protos.google.cloud.compute.v1.IAllowed;

/** Resource URLs end with the resource name */
export function lastSegment(url: string): string {
  return url.slice(url.lastIndexOf('/') + 1);
}

export function toInstance(resource: GcpInstance): Instance {
  const nic = resource.networkInterfaces?.[0];
  const accessConfigs = nic?.accessConfigs ?? [];
  const natIp = accessConfigs.find(config => !!config.natIP)?.natIP;
  const status = String(resource.status ?? InstanceStatus.Unknown);

  return {
    name: resource.name ?? '',
    status: isValidEnum(status, InstanceStatus) ? status : InstanceStatus.Unknown,
    tags: resource.tags?.items ?? [],
    labels: {...resource.labels},
    attachedDisks: (resource.disks ?? [])
      .map(disk => lastSegment(disk.source ?? disk.deviceName ?? ''))
      .filter(name => name.length > 0),
    hasExternalAccess: accessConfigs.length > 0,
    publicIp: natIp ? natIp : undefined,
  };
}

export function toDisk(resource: GcpDisk): Disk {
  return {
    name: resource.name ?? '',
    sizeGb: Number(resource.sizeGb ?? 0),
    users: (resource.users ?? []).map(lastSegment),
  };
}

/**
 * Expands allow entries into single ports. Ranges (`30000-30010`) are expanded; entries without ports (all ports of a
 * protocol) and protocols other than tcp/udp are skipped.
 */
export function toTransportPorts(allowed: readonly GcpAllowed[]): TransportPort[] {
  const ports: TransportPort[] = [];
  for (const entry of allowed) {
    const protocol = entry.IPProtocol;
    if (protocol !== 'tcp' && protocol !== 'udp') {
      continue;
    }

    for (const spec of entry.ports ?? []) {
      const [low, high = low] = spec.split('-').map(part => Number.parseInt(part, 10));
      for (let port = low; port <= high; port++) {
        ports.push({protocol, port});
      }
    }
  }
  return ports;
}

/** Groups ports into one allow entry per protocol, ports sorted ascending */
export function toAllowed(ports: readonly TransportPort[]): GcpAllowed[] {
  const byProtocol = new Map<string, Set<number>>();
  for (const {protocol, port} of ports) {
    const set = byProtocol.get(protocol) ?? new Set<number>();
    set.add(port);
    byProtocol.set(protocol, set);
  }

  return [...byProtocol.entries()]
    .sort(([l], [r]) => l.localeCompare(r))
    .map(([protocol, set]) => ({IPProtocol: protocol, ports: [...set].sort((l, r) => l - r).map(String)}));
}

export function toFirewallRule(resource: GcpFirewall): FirewallRule {
  return {
    name: resource.name ?? '',
    description: resource.description ?? undefined,
    allowed: toTransportPorts(resource.allowed ?? []),
    sourceTags: resource.sourceTags ?? [],
    sourceRanges: resource.sourceRanges ?? [],
    targetTags: resource.targetTags ?? [],
  };
}

export function toFirewallResource(rule: FirewallRule): GcpFirewall {
  return {
    name: rule.name,
    description: rule.description,
    network: 'global/networks/default',
    direction: 'INGRESS',
    allowed: toAllowed(rule.allowed),
    sourceTags: rule.sourceTags.length > 0 ? rule.sourceTags : undefined,
    sourceRanges: rule.sourceRanges.length > 0 ? rule.sourceRanges : undefined,
    targetTags: rule.targetTags,
  };
}

/** Compute Engine list filter matching every label */
export function labelFilter(labels: Record<string, string>): string {
  return Object.entries(labels)
    .map(([key, value]) => `(labels.${key} = "${value}")`)
    .join(' ');
}

import { fieldText, type ClusterObject } from './ClusterObject.js';

/** Perfdata unit suffix: none, bytes or seconds */
export type Unit = '' | 'B' | 's';

export type ResourceModeName = 'node' | 'qemu' | 'lxc' | 'storage';
export type ModeName = ResourceModeName | 'status';

interface ModeBase {
  help: string;
  /** Human-readable identifier used in findings and perfdata labels */
  objectName(object: ClusterObject): string;
}

/**
 * A mode backed by `/cluster/resources`, selected by `type=<name>`.
 */
export interface ResourceMode extends ModeBase {
  kind: 'resource';
  name: ResourceModeName;
  perfFields: Readonly<Record<string, Unit>>;
}

/**
 * The cluster membership check backed by `/cluster/status`.
 */
export interface StatusMode extends ModeBase {
  kind: 'status';
  name: 'status';
}

export type ModeDescriptor = ResourceMode | StatusMode;

const GUEST_FIELDS: Readonly<Record<string, Unit>> = {
  cpu: '',
  mem: 'B',
  disk: 'B',
  netin: 'B',
  netout: 'B',
  diskread: 'B',
  diskwrite: 'B',
  uptime: 's',
};

const MODES: Readonly<Record<ModeName, ModeDescriptor>> = {
  node: {
    kind: 'resource',
    name: 'node',
    help: 'Check cluster nodes (cpu, mem, disk, uptime)',
    perfFields: { cpu: '', mem: 'B', disk: 'B', uptime: 's' },
    objectName: (object) => fieldText(object, 'node'),
  },
  qemu: {
    kind: 'resource',
    name: 'qemu',
    help: 'Check QEMU virtual machines, named <node>.<name>',
    perfFields: GUEST_FIELDS,
    objectName: (object) => `${fieldText(object, 'node')}.${fieldText(object, 'name')}`,
  },
  lxc: {
    kind: 'resource',
    name: 'lxc',
    help: 'Check LXC containers, named by container name',
    perfFields: GUEST_FIELDS,
    objectName: (object) => fieldText(object, 'name'),
  },
  storage: {
    kind: 'resource',
    name: 'storage',
    help: 'Check storage usage, named <node>.<storage>',
    perfFields: { disk: 'B' },
    objectName: (object) => `${fieldText(object, 'node')}.${fieldText(object, 'storage')}`,
  },
  status: {
    kind: 'status',
    name: 'status',
    help: 'Check cluster quorum and node membership',
    objectName: (object) => fieldText(object, 'name'),
  },
};

export function isModeName(name: string): name is ModeName {
  return Object.prototype.hasOwnProperty.call(MODES, name);
}

export function getMode(name: string): ModeDescriptor | undefined {
  return isModeName(name) ? MODES[name] : undefined;
}

export function listModes(): ModeDescriptor[] {
  return Object.values(MODES);
}

/**
 * Performance field names in the order they are processed.
 */
export function sortedPerfFields(mode: ResourceMode): string[] {
  return Object.keys(mode.perfFields).sort();
}

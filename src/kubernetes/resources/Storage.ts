import * as k8s from '@kubernetes/client-node';
import { parseMemory } from '../utils/QuantityParser.js';
import { Metadata, byName } from './Metadata.js';
import { ConditionView } from './ComponentStatuses.js';

export type PersistentVolumeView = {
  access: string[] | null;
  capacity: number | null;
  status: { phase: string | null };
};

export type PersistentVolumeClaimView = {
  namespace: string | null;
  condition: ConditionView[] | null;
  phase: string | null;
  volume: string | null;
};

export type StorageClassView = {
  provisioner: string;
  reclaim_policy: string | null;
};

export class PersistentVolume extends Metadata {
  public readonly accessModes?: string[];
  public readonly phase?: string;
  private readonly storage?: string;

  constructor(pv: k8s.V1PersistentVolume) {
    super(pv.metadata);
    this.accessModes = pv.spec?.accessModes;
    this.storage = pv.spec?.capacity?.storage;
    this.phase = pv.status?.phase;
  }

  /** Storage capacity in bytes */
  public get capacity(): number | undefined {
    return this.storage ? parseMemory(this.storage) : undefined;
  }
}

export class PersistentVolumeClaim extends Metadata {
  public readonly conditions?: ConditionView[];
  public readonly phase?: string;
  public readonly volumeName?: string;

  constructor(pvc: k8s.V1PersistentVolumeClaim) {
    super(pvc.metadata);
    this.conditions = pvc.status?.conditions?.map((c) => ({ type: c.type, status: c.status }));
    this.phase = pvc.status?.phase;
    this.volumeName = pvc.spec?.volumeName;
  }
}

export class StorageClass extends Metadata {
  public readonly provisioner: string;
  public readonly reclaimPolicy?: string;

  constructor(storageClass: k8s.V1StorageClass) {
    super(storageClass.metadata);
    this.provisioner = storageClass.provisioner;
    this.reclaimPolicy = storageClass.reclaimPolicy;
  }
}

export class PersistentVolumeList {
  constructor(public readonly items: readonly PersistentVolume[]) {}

  public listVolumes(): Map<string, PersistentVolumeView> {
    return byName(this.items, (pv) => ({
      access: pv.accessModes ?? null,
      capacity: pv.capacity ?? null,
      status: { phase: pv.phase ?? null },
    }));
  }
}

export class PersistentVolumeClaimList {
  constructor(public readonly items: readonly PersistentVolumeClaim[]) {}

  public listVolumeClaims(): Map<string, PersistentVolumeClaimView> {
    return byName(this.items, (pvc) => ({
      namespace: pvc.namespace ?? null,
      condition: pvc.conditions ?? null,
      phase: pvc.phase ?? null,
      volume: pvc.volumeName ?? null,
    }));
  }
}

export class StorageClassList {
  constructor(public readonly items: readonly StorageClass[]) {}

  public listStorageClasses(): Map<string, StorageClassView> {
    return byName(this.items, (storageClass) => ({
      provisioner: storageClass.provisioner,
      reclaim_policy: storageClass.reclaimPolicy ?? null,
    }));
  }
}

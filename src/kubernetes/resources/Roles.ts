import * as k8s from '@kubernetes/client-node';
import { Metadata } from './Metadata.js';

export type RoleView = {
  name: string;
  namespace: string | null;
  creation_timestamp: number | null;
};

/**
 * A namespaced role or a cluster role; only its identity is reported
 */
export class Role extends Metadata {
  constructor(role: k8s.V1Role | k8s.V1ClusterRole) {
    super(role.metadata);
  }
}

export class RoleList {
  constructor(public readonly items: readonly Role[]) {}

  public listRoles(): RoleView[] {
    return this.items.flatMap((role) =>
      role.name
        ? [
            {
              name: role.name,
              namespace: role.namespace ?? null,
              creation_timestamp: role.creationTimestamp ?? null,
            },
          ]
        : [],
    );
  }
}

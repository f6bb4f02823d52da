import { AlertEvent } from '../alert-rules/alert-rules.types';
import { MeshConnectionState } from '../mesh/mesh.types';
import { ChangeSet, NodeState } from '../nodes/nodes.types';
import { DerivedStatus } from '../status/status.types';

export interface NodeView {
  state: NodeState;
  status: DerivedStatus;
  alerts: AlertEvent[];
}

export interface ForgetNodeOptions {
  deleteLogs?: boolean;
}

export interface ForgetNodeResult {
  nodeId: string;
  clearedAlerts: number;
  logsDeleted: boolean;
}

export interface EngineStatus {
  connection: MeshConnectionState;
  localNodeId: string | null;
  local: NodeView | null;
  helpRequested: boolean;
  nodeCount: number;
  activeAlerts: number;
  unreadMessages: number;
}

export type ChangeListener = (change: ChangeSet) => void;
export type AlertListener = (event: AlertEvent) => void;

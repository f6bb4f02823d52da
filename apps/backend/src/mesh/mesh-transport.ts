import { MeshConnectionState, MeshPacketListener, MeshSendResult } from './mesh.types';

/** Boundary to the radio network. Bound to the MQTT implementation in `MeshModule`. */
export abstract class MeshTransport {
  /** Registers a listener and returns a function that removes it. */
  abstract onPacket(listener: MeshPacketListener): () => void;

  abstract send(destination: string, payload: string, wantAck: boolean): Promise<MeshSendResult>;

  abstract connectionState(): MeshConnectionState;

  abstract connect(): Promise<void>;

  abstract disconnect(): Promise<void>;
}

import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { connect, IClientOptions, IPublishPacket, MqttClient } from 'mqtt';

import { MeshTransport } from './mesh-transport';
import {
  BROADCAST_DESTINATION,
  BROADCAST_NODE_NUMBER,
  MeshConnectionState,
  MeshPacketListener,
  MeshSendResult,
} from './mesh.types';
import { TransportError } from '../errors/engine-errors';
import { nodeNumberFromId, normalizeNodeId } from '../packets/node-id';

/**
 * Meshtastic JSON uplink/downlink over an MQTT broker. Retained messages replayed by the broker
 * on (re)subscribe describe nodes heard earlier, so they are flagged as reconciliation traffic.
 */
@Injectable()
export class MqttMeshTransport extends MeshTransport implements OnModuleDestroy {
  private readonly logger = new Logger(MqttMeshTransport.name);
  private readonly listeners = new Set<MeshPacketListener>();
  private client?: MqttClient;
  private state: MeshConnectionState = 'disconnected';

  constructor(private readonly configService: ConfigService) {
    super();
  }

  onPacket(listener: MeshPacketListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  connectionState(): MeshConnectionState {
    return this.state;
  }

  async connect(): Promise<void> {
    if (this.client) {
      return;
    }
    const url = this.configService.get<string>('mesh.mqttUrl', 'mqtt://localhost:1883');
    const rootTopic = this.configService.get<string>('mesh.rootTopic', 'msh/US/2/json');
    this.state = 'connecting';

    try {
      const client = await this.createClient(url);
      this.client = client;
      this.registerClient(client, rootTopic);
      await client.subscribeAsync(`${rootTopic}/#`, { qos: 0 });
      this.state = 'connected';
      this.logger.log(`Connected to ${url}, subscribed to ${rootTopic}/#`);
    } catch (error) {
      this.state = 'error';
      this.logger.error(
        `Failed to connect mesh MQTT transport: ${error instanceof Error ? error.message : error}`,
      );
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) {
      return;
    }
    this.client = undefined;
    await client.endAsync(true);
    this.state = 'disconnected';
    this.logger.log('Mesh MQTT transport disconnected');
  }

  async onModuleDestroy(): Promise<void> {
    await this.disconnect();
  }

  async send(destination: string, payload: string, wantAck: boolean): Promise<MeshSendResult> {
    const client = this.client;
    if (!client || this.state !== 'connected') {
      throw new TransportError(`Mesh transport is ${this.state}; cannot send to ${destination}`);
    }
    const localNodeId = this.configService.get<string>('mesh.localNodeId');
    if (!localNodeId) {
      throw new TransportError('MESH_LOCAL_NODE_ID is required to send on the mesh');
    }

    const to = this.resolveDestination(destination);
    const topic = this.configService.get<string>('mesh.downlinkTopic', 'msh/US/2/json/mqtt/');
    const envelope = JSON.stringify({
      from: nodeNumberFromId(localNodeId),
      to,
      channel: this.configService.get<number>('mesh.channelIndex', 0),
      type: 'sendtext',
      payload,
    });

    await new Promise<void>((resolve, reject) => {
      client.publish(topic, envelope, { qos: wantAck ? 1 : 0, retain: false }, (error) => {
        if (error) {
          reject(new TransportError(`Publish to ${topic} failed: ${error.message}`, { cause: error }));
          return;
        }
        resolve();
      });
    });

    this.logger.debug(`Sent ${payload.length} chars to ${destination}`);
    return { destination, sentAt: Date.now() };
  }

  private resolveDestination(destination: string): number {
    if (destination === BROADCAST_DESTINATION) {
      return BROADCAST_NODE_NUMBER;
    }
    const nodeId = normalizeNodeId(destination);
    if (!nodeId) {
      throw new TransportError(`Invalid destination ${destination}`);
    }
    return nodeNumberFromId(nodeId);
  }

  private registerClient(client: MqttClient, rootTopic: string): void {
    const downlinkTopic = this.configService.get<string>('mesh.downlinkTopic', `${rootTopic}/mqtt/`);

    client.on('message', (topic: string, message: Buffer, packet: IPublishPacket) => {
      if (topic.startsWith(downlinkTopic)) {
        return;
      }
      let envelope: unknown;
      try {
        envelope = JSON.parse(message.toString('utf8'));
      } catch (error) {
        this.logger.warn(
          `Dropping non-JSON payload on ${topic}: ${error instanceof Error ? error.message : error}`,
        );
        return;
      }
      const event = {
        envelope,
        reconciliation: packet.retain,
        arrivedAt: Date.now(),
        topic,
      };
      this.listeners.forEach((listener) => listener(event));
    });

    client.on('reconnect', () => {
      this.state = 'connecting';
    });
    client.on('connect', () => {
      this.state = 'connected';
    });
    client.on('close', () => {
      if (this.client === client) {
        this.state = 'disconnected';
      }
    });
    client.on('error', (error) => {
      this.state = 'error';
      this.logger.warn(`Mesh MQTT error: ${error.message}`);
    });
  }

  private createClient(url: string): Promise<MqttClient> {
    const connectTimeoutMs = this.configService.get<number>('mesh.connectTimeoutMs', 10_000);
    const options: IClientOptions = {
      clientId: this.configService.get<string>('mesh.clientId', 'mesh-telemetry-engine'),
      clean: true,
      reconnectPeriod: 5_000,
      connectTimeout: connectTimeoutMs,
    };
    const username = this.configService.get<string>('mesh.username');
    const password = this.configService.get<string>('mesh.password');
    if (username) {
      options.username = username;
    }
    if (password) {
      options.password = password;
    }

    return new Promise((resolve, reject) => {
      const client = connect(url, options);
      let settled = false;
      const timer = setTimeout(() => finish(new Error('MQTT connect timeout')), connectTimeoutMs);

      const finish = (error?: Error) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        client.removeListener('connect', handleConnect);
        client.removeListener('error', handleError);

        if (error) {
          client.end(true);
          reject(error);
        } else {
          resolve(client);
        }
      };

      const handleConnect = () => finish();
      const handleError = (error: Error) => finish(error);

      client.once('connect', handleConnect);
      client.once('error', handleError);
    });
  }
}

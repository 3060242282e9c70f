import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { WebSocketServer, type WebSocket } from 'ws';
import type { IncomingMessage } from 'http';
import { WebSocketTransport, parseBridgeMessage } from '../../src/ws-transport.js';
import { Droid } from '../../src/droid.js';
import { ConnectionError } from '../../src/errors.js';
import { DeviceId, PowerCommand } from '../../src/protocol/constants.js';
import { createResponse, decodePacket, encodePacket } from '../../src/protocol/packet.js';

type BridgeBehaviour = (socket: WebSocket, request: IncomingMessage) => void;

/**
 * In-process stand-in for a WebSocket-to-BLE bridge.
 */
class FakeBridge {
  readonly received: number[][] = [];
  readonly requestUrls: URL[] = [];
  private sockets = new Set<WebSocket>();
  private server: WebSocketServer | null = null;
  behaviour: BridgeBehaviour = socket => this.acceptAndAnswer(socket);

  async start(): Promise<string> {
    const server = new WebSocketServer({ port: 0, host: '127.0.0.1' });
    this.server = server;
    server.on('connection', (socket, request) => {
      this.sockets.add(socket);
      this.requestUrls.push(new URL(request.url ?? '/', 'ws://127.0.0.1'));
      socket.on('close', () => this.sockets.delete(socket));
      this.behaviour(socket, request);
    });
    await new Promise<void>(resolve => server.once('listening', () => resolve()));

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Bridge is not listening on a TCP port');
    }
    return `ws://127.0.0.1:${address.port}`;
  }

  async stop(): Promise<void> {
    for (const socket of this.sockets) {
      socket.terminate();
    }
    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>(resolve => server.close(() => resolve()));
    }
  }

  send(message: unknown): void {
    for (const socket of this.sockets) {
      socket.send(JSON.stringify(message));
    }
  }

  // Confirms the connection and acknowledges every request frame
  acceptAndAnswer(socket: WebSocket, payloadFor: (deviceId: number, commandId: number) => number[] = () => []): void {
    socket.send(JSON.stringify({ type: 'connected', device: 'D2-55E3' }));
    socket.on('message', raw => {
      const message = parseBridgeMessage(raw.toString());
      if (message?.type !== 'data') {
        return;
      }
      this.received.push(message.data);
      const request = decodePacket(Uint8Array.from(message.data));
      const reply = createResponse(request, Uint8Array.from(payloadFor(request.deviceId, request.commandId)));
      socket.send(JSON.stringify({ type: 'data', data: Array.from(encodePacket(reply)) }));
    });
  }
}

describe('WebSocketTransport', () => {
  let bridge: FakeBridge;
  let url: string;
  let transport: WebSocketTransport | null = null;

  beforeEach(async () => {
    bridge = new FakeBridge();
    url = await bridge.start();
  });

  afterEach(async () => {
    await transport?.disconnect();
    transport = null;
    await bridge.stop();
  });

  it('should connect and take the name reported by the bridge', async () => {
    transport = new WebSocketTransport({ url, device: 'D2-' });
    await transport.connect();

    expect(transport.isConnected()).toBe(true);
    expect(transport.name).toBe('D2-55E3');
    expect(bridge.requestUrls[0].searchParams.get('device')).toBe('D2-');
    expect(bridge.requestUrls[0].searchParams.get('service')).toBe('00010001-574f-4f20-5370-6865726f2121');
  });

  it('should tunnel written frames and deliver responses', async () => {
    transport = new WebSocketTransport({ url });
    const received: Uint8Array[] = [];
    transport.onReceive(data => received.push(data));
    await transport.connect();

    const wake = Uint8Array.of(0x8D, 0x0A, 0x13, 0x0D, 0x00, 0xD5, 0xD8);
    await transport.write(wake);

    await vi.waitFor(() => expect(received).toHaveLength(1));
    expect(bridge.received).toEqual([Array.from(wake)]);
    expect(received[0]).toEqual(Uint8Array.of(0x8D, 0x01, 0x13, 0x0D, 0x00, 0x00, 0xDE, 0xD8));
  });

  it('should deliver data sent right after the connection is confirmed', async () => {
    bridge.behaviour = socket => {
      socket.send(JSON.stringify({ type: 'connected' }));
      socket.send(JSON.stringify({ type: 'data', data: [1, 2, 3] }));
    };
    transport = new WebSocketTransport({ url });
    const received: Uint8Array[] = [];
    transport.onReceive(data => received.push(data));
    await transport.connect();

    await vi.waitFor(() => expect(received).toEqual([Uint8Array.of(1, 2, 3)]));
  });

  it('should emit disconnect when the bridge loses the droid', async () => {
    transport = new WebSocketTransport({ url });
    await transport.connect();
    const onDisconnect = vi.fn();
    transport.on('disconnect', onDisconnect);

    bridge.send({ type: 'disconnected', error: 'out of range' });

    await vi.waitFor(() => expect(onDisconnect).toHaveBeenCalledTimes(1));
    expect(transport.isConnected()).toBe(false);
  });

  it('should explain bridge close codes', async () => {
    bridge.behaviour = socket => socket.close(4001);
    transport = new WebSocketTransport({ url });

    await expect(transport.connect()).rejects.toThrow(
      'Bridge closed the connection (4001): Droid not found by the bridge'
    );
    expect(transport.isConnected()).toBe(false);
  });

  it('should reject when the bridge refuses the connection', async () => {
    bridge.behaviour = socket => socket.send(JSON.stringify({ type: 'error', error: 'Device busy' }));
    transport = new WebSocketTransport({ url });

    const error = await transport.connect().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toHaveProperty('message', 'Device busy');
  });

  it('should time out when the bridge never confirms', async () => {
    bridge.behaviour = () => undefined;
    transport = new WebSocketTransport({ url, connectTimeoutMs: 50 });

    await expect(transport.connect()).rejects.toThrow('Bridge did not confirm the connection within 50ms');
  });

  it('should refuse writes when not connected', async () => {
    transport = new WebSocketTransport({ url });
    await expect(transport.write(Uint8Array.of(1))).rejects.toThrow('Not connected to droid');
  });
});

describe('parseBridgeMessage', () => {
  it('should accept well-formed messages', () => {
    expect(parseBridgeMessage('{"type":"data","data":[141,216]}')).toEqual({ type: 'data', data: [141, 216] });
    expect(parseBridgeMessage('{"type":"connected","device":"D2-55E3"}'))
      .toEqual({ type: 'connected', device: 'D2-55E3' });
  });

  it('should reject anything else', () => {
    expect(parseBridgeMessage('not json')).toBeNull();
    expect(parseBridgeMessage('{"type":"data","data":[256]}')).toBeNull();
    expect(parseBridgeMessage('{"type":"eviction"}')).toBeNull();
  });
});

describe('Droid over a bridge', () => {
  let bridge: FakeBridge;

  beforeEach(() => {
    bridge = new FakeBridge();
  });

  afterEach(async () => {
    await bridge.stop();
  });

  it('should wake the droid and run commands end to end', async () => {
    bridge.behaviour = socket => bridge.acceptAndAnswer(socket, (deviceId, commandId) =>
      deviceId === DeviceId.POWER && commandId === PowerCommand.GET_BATTERY_VOLTAGE ? [0x01, 0x9A] : []
    );
    const url = await bridge.start();
    const droid = new Droid({ transport: 'bridge', bridgeUrl: url, commandIntervalMs: 0, commandTimeoutMs: 1000 });

    await droid.connect();
    expect(droid.name).toBe('D2-55E3');
    await expect(droid.getBatteryVoltage()).resolves.toBe(4.1);
    expect(bridge.received.map(frame => frame[3])).toEqual([PowerCommand.WAKE, PowerCommand.GET_BATTERY_VOLTAGE]);

    await droid.disconnect();
    expect(droid.isConnected()).toBe(false);
  });
});

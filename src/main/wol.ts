import { createSocket } from 'node:dgram';
import { errorMessage } from './errors.js';

export type WakeResult = { ok: true } | { ok: false; error: string };

export const macToBytes = (mac: string) => {
  const parts = mac.trim().replace(/-/g, ':').split(':');
  if (parts.length !== 6 || parts.some((part) => !/^[0-9a-f]{2}$/i.test(part))) {
    throw new Error(`invalid MAC address: ${mac}`);
  }
  return Buffer.from(parts.map((part) => parseInt(part, 16)));
};

/** Six 0xff bytes followed by the MAC repeated sixteen times. */
export const buildMagicPacket = (mac: string) => {
  const macBytes = macToBytes(mac);
  return Buffer.concat([Buffer.alloc(6, 0xff), ...Array.from({ length: 16 }, () => macBytes)]);
};

export const sendWakeOnLan = async (
  mac: string,
  broadcast = '255.255.255.255',
  port = 9
): Promise<WakeResult> => {
  let packet: Buffer;
  try {
    packet = buildMagicPacket(mac);
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }

  const socket = createSocket('udp4');
  try {
    await new Promise<void>((resolve, reject) => {
      socket.once('error', reject);
      socket.bind(() => {
        socket.setBroadcast(true);
        socket.send(packet, port, broadcast, (error) => (error ? reject(error) : resolve()));
      });
    });
    return { ok: true };
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  } finally {
    socket.close();
  }
};

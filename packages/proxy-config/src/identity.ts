import {ShortIdSetSchema, type ShortIdSet} from '@reality-reconciler/keymaterial';

import type {ProxyConfig} from './document.js';
import {err, ok, type ProxyConfigResult} from './errors.js';
import {listManagedInbounds, readObject} from './inbounds.js';
import type {ListenProfile} from './synthesize.js';

export type RealityIdentity = {
  privateKey: string;
  shortIds: ShortIdSet;
  serverNames: string[];
  destination: string;
  listenProfiles: ListenProfile[];
};

const readStringArray = (value: unknown): string[] =>
  Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];

/** Reads the managed identity back out of a document; the first managed inbound is the primary. */
export const readRealityIdentity = (config: ProxyConfig): ProxyConfigResult<RealityIdentity> => {
  const managed = listManagedInbounds(config);
  const primary = managed[0];
  if (!primary) {
    return err('managed_inbound_missing', 'config has no Reality inbound');
  }

  const streamSettings = readObject(primary, 'streamSettings');
  const realitySettings = streamSettings ? readObject(streamSettings, 'realitySettings') : undefined;
  const privateKey = realitySettings?.privateKey;
  const shortIds = ShortIdSetSchema.safeParse(realitySettings?.shortIds);
  if (!realitySettings || typeof privateKey !== 'string' || !shortIds.success) {
    return err('managed_inbound_missing', 'primary Reality inbound has no usable realitySettings');
  }

  const listenProfiles: ListenProfile[] = [];
  managed.forEach((inbound, index) => {
    if (typeof inbound.port !== 'number') {
      return;
    }
    listenProfiles.push({
      port: inbound.port,
      isPrimary: index === 0,
      ...(typeof inbound.listen === 'string' ? {listen: inbound.listen} : {})
    });
  });

  return ok({
    privateKey,
    shortIds: shortIds.data,
    serverNames: readStringArray(realitySettings.serverNames),
    destination: typeof realitySettings.dest === 'string' ? realitySettings.dest : '',
    listenProfiles
  });
};

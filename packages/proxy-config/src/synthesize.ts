import {KeyPairSchema, ShortIdSetSchema, type KeyPair, type ShortIdSet} from '@reality-reconciler/keymaterial';
import {z} from 'zod';

import {createDefaultConfig, createDefaultRealityInbound, DEFAULT_LISTEN_ADDRESS} from './defaults.js';
import type {JsonObject, JsonValue, ProxyConfig} from './document.js';
import {err, ok, type ProxyConfigResult} from './errors.js';
import {
  createManagedInboundFilter,
  ensureObject,
  isRealityInbound,
  listInbounds,
  managedInboundTag
} from './inbounds.js';

export const ListenProfileSchema = z
  .object({
    port: z.number().int().min(1).max(65535),
    isPrimary: z.boolean(),
    listen: z.string().trim().min(1).optional()
  })
  .strict();

export type ListenProfile = z.infer<typeof ListenProfileSchema>;

const SynthesizeInputSchema = z
  .object({
    keyPair: KeyPairSchema,
    shortIds: ShortIdSetSchema,
    destination: z.string().trim().min(1),
    serverNames: z.array(z.string().trim().min(1)).min(1),
    listenProfiles: z.array(ListenProfileSchema).min(1)
  })
  .superRefine((value, ctx) => {
    const primaryCount = value.listenProfiles.filter(profile => profile.isPrimary).length;
    if (primaryCount !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `exactly one primary listen profile is required, got ${primaryCount}`,
        path: ['listenProfiles']
      });
    }

    const ports = value.listenProfiles.map(profile => profile.port);
    if (new Set(ports).size !== ports.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'listen profile ports must be unique',
        path: ['listenProfiles']
      });
    }
  });

export type SynthesizeInput = {
  prior?: ProxyConfig;
  keyPair: KeyPair;
  shortIds: ShortIdSet;
  destination: string;
  serverNames: string[];
  listenProfiles: ListenProfile[];
};

type ManagedIdentity = Omit<SynthesizeInput, 'prior' | 'listenProfiles'>;

const orderProfiles = (profiles: ListenProfile[]) => [
  ...profiles.filter(profile => profile.isPrimary),
  ...profiles.filter(profile => !profile.isPrimary)
];

const applyManagedFields = ({
  inbound,
  profile,
  identity
}: {
  inbound: JsonObject;
  profile: ListenProfile;
  identity: ManagedIdentity;
}): JsonObject => {
  inbound.listen = profile.listen ?? DEFAULT_LISTEN_ADDRESS;
  inbound.port = profile.port;
  inbound.protocol = 'vless';
  if (typeof inbound.tag !== 'string' || inbound.tag.length === 0) {
    inbound.tag = managedInboundTag(profile.port);
  }

  const streamSettings = ensureObject(inbound, 'streamSettings');
  if (typeof streamSettings.network !== 'string') {
    streamSettings.network = 'tcp';
  }
  streamSettings.security = 'reality';

  const realitySettings = ensureObject(streamSettings, 'realitySettings');
  realitySettings.dest = identity.destination;
  realitySettings.serverNames = [...identity.serverNames];
  realitySettings.privateKey = identity.keyPair.privateKey;
  realitySettings.shortIds = [...identity.shortIds];

  return inbound;
};

const withoutTag = (inbound: JsonObject): JsonObject => {
  delete inbound.tag;
  return inbound;
};

const portOf = (inbound: JsonObject) => (typeof inbound.port === 'number' ? inbound.port : undefined);

/**
 * Builds a candidate document. Managed inbounds, and Reality inbounds on a
 * listen profile's port, are rebuilt from the arguments on top of their prior
 * counterparts; everything else in `prior`, operator Reality inbounds on other
 * ports included, is carried over untouched. Pure: identical inputs give identical output.
 */
export const synthesize = (input: SynthesizeInput): ProxyConfigResult<ProxyConfig> => {
  const parsedInput = SynthesizeInputSchema.safeParse({
    keyPair: input.keyPair,
    shortIds: input.shortIds,
    destination: input.destination,
    serverNames: input.serverNames,
    listenProfiles: input.listenProfiles
  });
  if (!parsedInput.success) {
    return err(
      'invalid_synthesis_input',
      parsedInput.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    );
  }

  const identity: ManagedIdentity = {
    keyPair: parsedInput.data.keyPair,
    shortIds: parsedInput.data.shortIds,
    destination: parsedInput.data.destination,
    serverNames: parsedInput.data.serverNames
  };
  const document: ProxyConfig = input.prior ? structuredClone(input.prior) : createDefaultConfig();
  const priorInbounds = listInbounds(document);
  const isManagedInbound = createManagedInboundFilter(document);
  const profilePorts = new Set(parsedInput.data.listenProfiles.map(profile => profile.port));
  // A Reality inbound on a profile port is replaced even when the operator tagged it.
  const isClaimed = (inbound: JsonValue): inbound is JsonObject =>
    isManagedInbound(inbound) || (isRealityInbound(inbound) && profilePorts.has(portOf(inbound) ?? -1));

  const priorClaimed = priorInbounds.filter(isClaimed);
  const priorClaimedByPort = new Map<number, JsonObject>();
  for (const inbound of priorClaimed) {
    const port = portOf(inbound);
    if (port !== undefined && !priorClaimedByPort.has(port)) {
      priorClaimedByPort.set(port, inbound);
    }
  }
  const priorPrimary = priorInbounds.find(isManagedInbound);

  const managedInbounds = orderProfiles(parsedInput.data.listenProfiles).map(profile => {
    const base =
      priorClaimedByPort.get(profile.port) ??
      (priorPrimary ? withoutTag(structuredClone(priorPrimary)) : createDefaultRealityInbound(identity));
    return applyManagedFields({inbound: base, profile, identity});
  });

  const nextInbounds: JsonValue[] = [];
  let managedPlaced = false;
  for (const inbound of priorInbounds) {
    if (isClaimed(inbound)) {
      if (!managedPlaced) {
        nextInbounds.push(...managedInbounds);
        managedPlaced = true;
      }
      continue;
    }
    nextInbounds.push(inbound);
  }
  if (!managedPlaced) {
    nextInbounds.unshift(...managedInbounds);
  }

  document.inbounds = nextInbounds;
  return ok(document);
};

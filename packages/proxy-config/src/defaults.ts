import type {JsonObject, ProxyConfig} from './document.js';

export const DEFAULT_LISTEN_ADDRESS = '::';
export const API_INBOUND_PORT = 50051;

/** Sections written when there is no prior document to carry over. */
export const createDefaultConfig = (): ProxyConfig => ({
  log: {
    loglevel: 'warning',
    access: '/var/log/xray/access.log',
    error: '/var/log/xray/error.log'
  },
  api: {
    tag: 'api',
    services: ['HandlerService', 'LoggerService', 'StatsService']
  },
  stats: {},
  policy: {
    levels: {
      '0': {
        statsUserUplink: true,
        statsUserDownlink: true
      }
    },
    system: {
      statsInboundUplink: true,
      statsInboundDownlink: true,
      statsOutboundUplink: true,
      statsOutboundDownlink: true
    }
  },
  inbounds: [
    {
      listen: '127.0.0.1',
      port: API_INBOUND_PORT,
      protocol: 'dokodemo-door',
      settings: {
        address: '127.0.0.1'
      },
      tag: 'api'
    }
  ],
  outbounds: [
    {
      protocol: 'freedom',
      settings: {
        domainStrategy: 'UseIPv4'
      },
      tag: 'direct'
    },
    {
      protocol: 'blackhole',
      settings: {
        response: {
          type: 'http'
        }
      },
      tag: 'blocked'
    }
  ],
  routing: {
    domainStrategy: 'IPIfNonMatch',
    rules: [
      {
        type: 'field',
        inboundTag: ['api'],
        outboundTag: 'api'
      },
      {
        type: 'field',
        protocol: ['bittorrent'],
        outboundTag: 'blocked'
      }
    ]
  }
});

export const createDefaultRealityInbound = ({destination}: {destination: string}): JsonObject => ({
  listen: DEFAULT_LISTEN_ADDRESS,
  port: 443,
  protocol: 'vless',
  settings: {
    clients: [],
    decryption: 'none',
    fallbacks: [{dest: destination}]
  },
  streamSettings: {
    network: 'tcp',
    security: 'reality',
    realitySettings: {
      show: false,
      dest: destination,
      xver: 0,
      serverNames: [],
      privateKey: '',
      minClientVer: '',
      maxClientVer: '',
      maxTimeDiff: 0,
      shortIds: []
    }
  },
  sniffing: {
    enabled: true,
    destOverride: ['http', 'tls']
  }
});

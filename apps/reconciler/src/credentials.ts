import type {CredentialRecord} from '@reality-reconciler/credential-store'
import type {KeyMaterialGenerator} from '@reality-reconciler/keymaterial'
import {parseConfigDocument, readRealityIdentity, type ProxyConfig} from '@reality-reconciler/proxy-config'

export type RecordResult = {ok: true; value: CredentialRecord} | {ok: false; code: string; message: string}

export const withServerAddress = (
  record: Omit<CredentialRecord, 'serverAddress'>,
  serverAddress: string | undefined
): CredentialRecord => (serverAddress ? {...record, serverAddress} : record)

/** Rebuilds the credential record a config document implies; the public key comes from the engine. */
export const credentialRecordFromConfig = async ({
  generator,
  config,
  serverAddress
}: {
  generator: KeyMaterialGenerator
  config: ProxyConfig | string
  serverAddress: string | undefined
}): Promise<RecordResult> => {
  const document = typeof config === 'string' ? parseConfigDocument(config) : {ok: true as const, value: config}
  if (!document.ok) {
    return {ok: false, code: document.error.code, message: document.error.message}
  }

  const identity = readRealityIdentity(document.value)
  if (!identity.ok) {
    return {ok: false, code: identity.error.code, message: identity.error.message}
  }

  const publicKey = await generator.derivePublicKey(identity.value.privateKey)
  if (!publicKey.ok) {
    return {ok: false, code: publicKey.error.code, message: publicKey.error.message}
  }

  return {
    ok: true,
    value: withServerAddress(
      {privateKey: identity.value.privateKey, publicKey: publicKey.value, shortIds: identity.value.shortIds},
      serverAddress
    )
  }
}

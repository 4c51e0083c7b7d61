import {z} from 'zod';

export const proxyConfigErrorCodeSchema = z.enum([
  'invalid_synthesis_input',
  'document_not_json',
  'structural_invalid',
  'semantic_invalid',
  'validator_unavailable',
  'managed_inbound_missing'
]);

export type ProxyConfigErrorCode = z.infer<typeof proxyConfigErrorCodeSchema>;

export type ValidationPhase = 'structural' | 'semantic';

export type ProxyConfigError = {
  code: ProxyConfigErrorCode;
  message: string;
  phase?: ValidationPhase;
  detail?: string;
};

export type ProxyConfigSuccess<T> = {ok: true; value: T};
export type ProxyConfigFailure = {ok: false; error: ProxyConfigError};
export type ProxyConfigResult<T> = ProxyConfigSuccess<T> | ProxyConfigFailure;

export const ok = <T>(value: T): ProxyConfigSuccess<T> => ({ok: true, value});

export const err = (
  code: ProxyConfigErrorCode,
  message: string,
  extra: Pick<ProxyConfigError, 'phase' | 'detail'> = {}
): ProxyConfigFailure => ({
  ok: false,
  error: {code, message, ...extra}
});

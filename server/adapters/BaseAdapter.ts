export type AdapterValidateResult =
  | { ok: true; sourceType: string; sourceNativeId: string }
  | { ok: false; errorCode: 'VALIDATION_ERROR'; message: string };

export interface BaseAdapter {
  id: string;
  sourceType: string;
  validate(raw: string): AdapterValidateResult;
}

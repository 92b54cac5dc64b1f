// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type Identity = Brand<string, "Identity">;
export type BatchId = Brand<bigint, "BatchId">;
export type RequestId = Brand<bigint, "RequestId">;
export type Seconds = Brand<bigint, "Seconds">;

export const asIdentity = (s: string): Identity => s as Identity;
export const asBatchId = (n: bigint): BatchId => n as BatchId;
export const asRequestId = (n: bigint): RequestId => n as RequestId;
export const asSeconds = (n: bigint): Seconds => n as Seconds;

/**
 * 釋放資源。傳入 undefined 時不做任何事。
 */
export async function dispose(
  target: AsyncDisposable | undefined
): Promise<void> {
  if (!target) return;
  await target[Symbol.asyncDispose]();
}

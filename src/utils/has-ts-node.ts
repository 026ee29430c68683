export type ResolveFunction = (id: string) => string

export default function hasTSNode(resolveFn: ResolveFunction) {
  try {
    resolveFn('ts-node')
    return true
  } catch (error: unknown) {
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'MODULE_NOT_FOUND') {
      return false
    }
    throw error
  }
}

import path from 'path'
import { fileURLToPath } from 'url'

function captureCallSites(): NodeJS.CallSite[] {
  const prepareStackTrace = Error.prepareStackTrace
  let callSites: NodeJS.CallSite[] = []

  Error.prepareStackTrace = (_, stack) => {
    callSites = stack
    return ''
  }
  // Reading the stack runs prepareStackTrace
  void new Error().stack
  Error.prepareStackTrace = prepareStackTrace

  return callSites.slice(1)
}

/**
 * Resolves a relative function module path against the file that called into the library.
 *
 * `callerDepth` counts the frames between this function and that caller
 * (1 is whoever called `resolveWorkerPath`).
 */
export function resolveWorkerPath(workerPath: string, callerDepth = 2): string {
  if (path.isAbsolute(workerPath)) {
    return workerPath
  }

  const callerFile = captureCallSites()
    .map((callSite) => callSite.getFileName())
    .filter((fileName): fileName is string => Boolean(fileName))[callerDepth]

  if (!callerFile) {
    return path.resolve(workerPath)
  }

  const callerPath = callerFile.startsWith('file://') ? fileURLToPath(callerFile) : callerFile
  const { dir: basePath } = path.parse(callerPath)

  return path.resolve(basePath, workerPath)
}

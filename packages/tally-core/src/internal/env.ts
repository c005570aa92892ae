// Runtime environment detection, read lazily so bundlers cannot inline NODE_ENV at build time.
export const getNodeEnv = (): string | undefined => {
  try {
    const env = typeof process === 'undefined' ? undefined : process.env
    return typeof env?.NODE_ENV === 'string' ? env.NODE_ENV : undefined
  } catch {
    return undefined
  }
}

export const isDevEnv = (): boolean => getNodeEnv() !== 'production'

import type { Provider } from './types/provider.ts'

let providers = new Map<string, Provider>()

/**
 * Register providers for use, keyed by `name()`. A provider with the same
 * name replaces the earlier one.
 */
export const useProviders = (...list: Provider[]): void => {
  for (const provider of list) {
    providers.set(provider.name(), provider)
  }
}

export const getProviders = (): ReadonlyMap<string, Provider> =>
  new Map(providers)

export const getProvider = (name: string): Provider => {
  const provider = providers.get(name)
  if (!provider) {
    throw new Error(`no provider for ${name} exists`)
  }
  return provider
}

export const deleteProvider = (name: string): void => {
  providers.delete(name)
}

/** Remove every registered provider. Mostly useful in tests. */
export const clearProviders = (): void => {
  providers = new Map()
}

declare module 'hono' {
  interface ContextVariableMap {
    /** Server-side session id issued during the current request. */
    authSessionId: string
  }
}

export {}

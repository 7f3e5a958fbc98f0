/**
 * Parameter Store Port (Driven Port)
 * Key-value configuration fetch (SSM Parameter Store)
 */
export interface ParameterStorePort {
  /**
   * Fetch parameters by name in a single call. Names that do not exist are
   * absent from the result; transport errors reject the whole call.
   */
  getParameters(names: string[]): Promise<Record<string, string>>;
}

type DialectFactory<TConfig, TDialect> = (config: TConfig) => TDialect;

export type DialectRegistry<TConfig extends { type: string }, TDialect> = {
  /** Called by each dialect implementation to register itself */
  register: (type: string, factory: DialectFactory<TConfig, TDialect>) => void;
  /** Build the dialect named by `config.type` */
  create: (config: TConfig) => TDialect;
};

export const createRegistry = <TConfig extends { type: string }, TDialect>(
  kind: string
): DialectRegistry<TConfig, TDialect> => {
  const factories = new Map<string, DialectFactory<TConfig, TDialect>>();

  return {
    register: (type, factory) => {
      factories.set(type, factory);
    },
    create: (config) => {
      const factory = factories.get(config.type);
      if (!factory) {
        const available = Array.from(factories.keys()).join(', ') || 'none';
        throw new Error(`Unknown ${kind} type "${config.type}". Available: ${available}`);
      }
      return factory(config);
    },
  };
};

import { ValidationError } from '@competency-search/common';

import type { Provider } from '../types';
import type { MapperFactory } from './contract';
import { createEscoMapper } from './esco';
import { createFormaMapper } from './forma';
import { createFormaV14Mapper } from './forma14';
import { createRomeMapper } from './rome';

export type MapperRegistry = ReadonlyMap<Provider, MapperFactory>;

export function createMapperRegistry(): MapperRegistry {
  return new Map<Provider, MapperFactory>([
    ['esco', createEscoMapper],
    ['rome', createRomeMapper],
    ['forma', createFormaMapper],
    ['forma14', createFormaV14Mapper]
  ]);
}

export function resolveMapper(registry: MapperRegistry, provider: Provider): MapperFactory {
  const factory = registry.get(provider);
  if (!factory) {
    throw new ValidationError(`No mapper registered for provider '${provider}'.`, { details: { provider } });
  }
  return factory;
}

/**
 * @file Generator Registry
 *
 * One factory per service type. The mapped type makes a missing service a
 * compile error.
 *
 * @module generators
 */

import type { ServiceType } from '../config/types.js';
import type { ServiceGenerator } from './types.js';
import { NginxGenerator } from './NginxGenerator.js';
import { JavaAppGenerator } from './JavaAppGenerator.js';
import { KubernetesGenerator } from './KubernetesGenerator.js';
import { SystemAccessGenerator } from './SystemAccessGenerator.js';
import { EcommerceGenerator } from './EcommerceGenerator.js';
import { ApiGatewayGenerator } from './ApiGatewayGenerator.js';
import { DatabaseGenerator } from './DatabaseGenerator.js';
import { DockerGenerator } from './DockerGenerator.js';
import { CdnGenerator } from './CdnGenerator.js';
import { CicdGenerator } from './CicdGenerator.js';

export type GeneratorFactories = { readonly [K in ServiceType]: () => ServiceGenerator & { readonly service: K } };

export const GENERATOR_FACTORIES: GeneratorFactories = {
    nginx:         () => new NginxGenerator(),
    java_app:      () => new JavaAppGenerator(),
    kubernetes:    () => new KubernetesGenerator(),
    system_access: () => new SystemAccessGenerator(),
    ecommerce:     () => new EcommerceGenerator(),
    api_gateway:   () => new ApiGatewayGenerator(),
    database:      () => new DatabaseGenerator(),
    docker:        () => new DockerGenerator(),
    cdn:           () => new CdnGenerator(),
    cicd:          () => new CicdGenerator(),
};

export function generator_create(service: ServiceType): ServiceGenerator {
    return GENERATOR_FACTORIES[service]();
}

export type { GenerationContext, LogRecord, RecordFields, ServiceGenerator, WireFormat } from './types.js';

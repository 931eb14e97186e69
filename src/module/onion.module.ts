import 'reflect-metadata'

import { Global, Logger, Module } from '@nestjs/common'

import { resolveOnionOptions } from '../config/onion.options'
import { CryptoError, CryptoErrorCode } from '../errors/crypto.error'
import { ServiceKeyLoader } from '../keystore/service-key-loader'
import { ControlAuthService } from '../services/control-auth.service'
import { DescriptorIdService } from '../services/descriptor-id.service'
import { OnionAddressService } from '../services/onion-address.service'

import { ONION_OPTIONS } from './onion.tokens'

import type {
  OnionModuleAsyncOptions,
  OnionModuleOptions,
  ResolvedOnionModuleOptions,
} from '../config/onion.options'
import type { DynamicModule, Provider } from '@nestjs/common'

function keyLoaderFactory(opts: ResolvedOnionModuleOptions): ServiceKeyLoader {
  return new ServiceKeyLoader(
    { retries: opts.keyDecryptRetries, passphraseSource: opts.passphraseSource },
    new Logger(ServiceKeyLoader.name),
  )
}

function controlAuthFactory(opts: ResolvedOnionModuleOptions): ControlAuthService {
  return new ControlAuthService(opts, new Logger(ControlAuthService.name))
}

const coreProviders: Provider[] = [
  { provide: OnionAddressService, useFactory: () => new OnionAddressService() },
  {
    provide: DescriptorIdService,
    useFactory: (opts: ResolvedOnionModuleOptions) => new DescriptorIdService(opts),
    inject: [ONION_OPTIONS],
  },
]

@Global()
@Module({})
export class OnionModule {
  /**
   * @summary Register the module with synchronous options.
   * @param options Feature flags, key loading and control-port settings.
   * @returns A dynamic module; disabled features are left out.
   */
  static register(options: OnionModuleOptions = {}): DynamicModule {
    const resolved = resolveOnionOptions(options)
    const providers: Provider[] = [
      { provide: ONION_OPTIONS, useValue: resolved },
      ...coreProviders,
      ...(resolved.enableKeyLoader
        ? [{ provide: ServiceKeyLoader, useFactory: () => keyLoaderFactory(resolved) }]
        : []),
      ...(resolved.enableControl
        ? [{ provide: ControlAuthService, useFactory: () => controlAuthFactory(resolved) }]
        : []),
    ]
    return { module: OnionModule, providers, exports: providers }
  }

  /**
   * @summary Register the module with options from an async factory.
   * @remarks
   * Every provider is registered, so the options must leave each feature enabled; a
   * disabled one fails module initialisation with `CONFIG_ERROR`.
   */
  static registerAsync(options: OnionModuleAsyncOptions): DynamicModule {
    const optionsProvider: Provider = {
      provide: ONION_OPTIONS,
      useFactory: async (...args: unknown[]) =>
        resolveOnionOptions(await options.useFactory(...args)),
      inject: [...(options.inject ?? [])],
    }
    const featureProviders: Provider[] = [
      {
        provide: ServiceKeyLoader,
        useFactory: (opts: ResolvedOnionModuleOptions) => {
          if (!opts.enableKeyLoader) {
            throw new CryptoError(
              CryptoErrorCode.CONFIG_ERROR,
              'ServiceKeyLoader requires enableKeyLoader to be true',
            )
          }
          return keyLoaderFactory(opts)
        },
        inject: [ONION_OPTIONS],
      },
      {
        provide: ControlAuthService,
        useFactory: (opts: ResolvedOnionModuleOptions) => {
          if (!opts.enableControl) {
            throw new CryptoError(
              CryptoErrorCode.CONFIG_ERROR,
              'ControlAuthService requires enableControl to be true',
            )
          }
          return controlAuthFactory(opts)
        },
        inject: [ONION_OPTIONS],
      },
    ]
    const providers: Provider[] = [optionsProvider, ...coreProviders, ...featureProviders]
    return {
      module: OnionModule,
      imports: options.imports ?? [],
      providers,
      exports: providers,
    }
  }
}

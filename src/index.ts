// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * actor-route-bridge - Actors as endpoints of an in-process routing middleware
 *
 * @packageDocumentation
 */

// bridge
export { RouteBridge } from './bridge/RouteBridge.js'
export type { Addressable } from './bridge/RouteBridge.js'
export { ConsumerActor } from './bridge/ConsumerActor.js'
export type { Consumer } from './bridge/ConsumerActor.js'
export { ProducerActor } from './bridge/ProducerActor.js'
export type { Producer } from './bridge/ProducerActor.js'
export { ConsumerAdapter } from './bridge/ConsumerAdapter.js'
export type { ConsumerSettings, EnvelopeReceiver } from './bridge/ConsumerAdapter.js'
export { Envelope } from './bridge/Envelope.js'
export { BodyTypes } from './bridge/BodyTypes.js'
export type { BodyType } from './bridge/BodyTypes.js'
export { Ack, Failure, ResponseProtocol, isAck, isFailure } from './bridge/Acknowledgement.js'
export type { Acknowledgement } from './bridge/Acknowledgement.js'
export { ActivationState, ActivationTracker } from './bridge/ActivationTracker.js'
export { ExchangeWaiter } from './bridge/ExchangeWaiter.js'
export type { Resolution } from './bridge/ExchangeWaiter.js'
export { BridgeConfigs, BridgeConfigSchema } from './bridge/BridgeConfig.js'
export type { BridgeConfig } from './bridge/BridgeConfig.js'
export {
  BridgeError,
  TypeConversionError,
  UnexpectedResponseError,
  ActorUnavailableError,
  ActivationStateError,
  DuplicateConsumerError
} from './bridge/BridgeErrors.js'
export type { BridgeErrorCode } from './bridge/BridgeErrors.js'

// routing
export { RoutingContext } from './routing/RoutingContext.js'
export { RouteDefinition, ExceptionPolicyBuilder } from './routing/RouteDefinition.js'
export type { RouteTarget } from './routing/RouteDefinition.js'
export { Route, RouteStatus } from './routing/Route.js'
export { Exchange, ExchangePattern, RoutingHeaders } from './routing/Exchange.js'
export type { Headers } from './routing/Exchange.js'
export { EndpointUri } from './routing/EndpointUri.js'
export { DirectComponent } from './routing/DirectComponent.js'
export type { Component, Endpoint, EndpointConsumer } from './routing/Component.js'
export { processFully } from './routing/Processor.js'
export type { Processor } from './routing/Processor.js'
export { ProducerTemplate } from './routing/ProducerTemplate.js'
export { ExchangeFuture } from './routing/ExchangeFuture.js'
export { RedeliveryErrorHandler } from './routing/RedeliveryErrorHandler.js'
export { Transforms, matches, isErrorClass, validateExceptionPolicy } from './routing/ExceptionPolicy.js'
export type {
  ErrorClass,
  ErrorPredicate,
  ExceptionMatcher,
  ExceptionPolicy,
  ExceptionTransform
} from './routing/ExceptionPolicy.js'
export {
  RoutingError,
  RouteCreationError,
  EndpointResolutionError,
  NoConsumerAvailableError,
  ExecutionError,
  TimeoutError
} from './routing/RoutingErrors.js'
export type { RoutingErrorCode } from './routing/RoutingErrors.js'

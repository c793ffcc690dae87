// lib/endpoint-lifecycle/lifecycle-decision.ts
import { EndpointDescriptor, EndpointState, FailedEndpointPolicy, LifecycleAction } from './types';

export interface LifecycleDecision {
  readonly action: LifecycleAction;
  readonly reason: string;
}

/**
 * Maps freshly probed endpoint state to the next action. No I/O; the same
 * descriptor and policy always give the same decision.
 */
export function decideLifecycleAction(
  endpoint: EndpointDescriptor,
  failedPolicy: FailedEndpointPolicy = FailedEndpointPolicy.RECREATE,
): LifecycleDecision {
  switch (endpoint.currentState) {
    case EndpointState.ABSENT:
      return { action: LifecycleAction.CREATE, reason: 'first deployment' };
    case EndpointState.IN_SERVICE:
      return { action: LifecycleAction.UPDATE, reason: 'rolling update to the new artifact' };
    case EndpointState.CREATING:
    case EndpointState.UPDATING:
      return { action: LifecycleAction.CONFLICT, reason: `a transition is already in flight (${endpoint.currentState})` };
    case EndpointState.FAILED:
      return decideForFailedEndpoint(failedPolicy);
  }
}

function decideForFailedEndpoint(policy: FailedEndpointPolicy): LifecycleDecision {
  switch (policy) {
    case FailedEndpointPolicy.RECREATE:
      return { action: LifecycleAction.CREATE, reason: 'recreate the failed endpoint' };
    case FailedEndpointPolicy.RESUME:
      return { action: LifecycleAction.UPDATE, reason: 'resume the failed endpoint on a new config' };
    case FailedEndpointPolicy.HALT:
      return { action: LifecycleAction.NO_OP, reason: 'failed endpoint left for an operator' };
  }
}

import { Document } from "yaml";
import { ProfileError, ProfileErrorCode } from "./errors.js";
import type { NetworkRule, Profile } from "./profile.js";

/** Label every namespace carries with its own name */
export const NAMESPACE_NAME_LABEL = "kubernetes.io/metadata.name";

export type PolicyType = "Ingress" | "Egress";

export interface NamespacePeer {
  namespaceSelector: {
    matchLabels: Record<string, string>;
  };
}

export interface PolicyPort {
  protocol: string;
  port: number | string;
}

export interface IngressEntry {
  from: NamespacePeer[];
  ports: PolicyPort[];
}

export interface EgressEntry {
  to: NamespacePeer[];
  ports: PolicyPort[];
}

export interface NetworkPolicy {
  apiVersion: "networking.k8s.io/v1";
  kind: "NetworkPolicy";
  metadata: {
    name: string;
    namespace: string;
  };
  spec: {
    podSelector: {
      matchLabels?: Record<string, string>;
    };
    policyTypes: PolicyType[];
    ingress?: IngressEntry[];
    egress?: EgressEntry[];
  };
}

export interface NetworkPolicyOptions {
  /**
   * Fail when a rule has no peer namespace instead of selecting the
   * namespace named ""
   */
  strictPeers?: boolean;
}

export interface NetworkPolicySet {
  defaultDeny: NetworkPolicy;
  allow: NetworkPolicy;
}

const NAMESPACE_REF = "{{ .Values.namespace }}";
const APP_NAME_REF = "{{ .Values.app.name }}";

function peerNamespace(rule: NetworkRule, options: NetworkPolicyOptions): string {
  if (rule.peerNamespace !== undefined) {
    return rule.peerNamespace;
  }
  if (options.strictPeers) {
    throw new ProfileError(
      ProfileErrorCode.MISSING_FIELD,
      `Profile is missing required field "${rule.peerPath}"`,
      { field: rule.peerPath }
    );
  }
  return "";
}

function peer(namespace: string): NamespacePeer {
  return { namespaceSelector: { matchLabels: { [NAMESPACE_NAME_LABEL]: namespace } } };
}

function ports(rule: NetworkRule): PolicyPort[] {
  return [{ protocol: rule.protocol, port: rule.port }];
}

/**
 * Policy types follow the default-deny flags and are shared by both
 * policies: a policy only restricts the directions it declares
 */
export function policyTypes(profile: Profile): PolicyType[] {
  const types: PolicyType[] = [];
  if (profile.defaultDenyIngress) {
    types.push("Ingress");
  }
  if (profile.defaultDenyEgress) {
    types.push("Egress");
  }
  return types;
}

/**
 * Build the default-deny policy and the allow-exceptions policy
 */
export function buildNetworkPolicies(
  profile: Profile,
  options: NetworkPolicyOptions = {}
): NetworkPolicySet {
  const rules = profile.rules;
  const types = policyTypes(profile);

  // Order within each direction is kept for readability; Kubernetes ORs the entries
  const ingress: IngressEntry[] = rules
    .filter((rule) => rule.direction === "ingress")
    .map((rule) => ({ from: [peer(peerNamespace(rule, options))], ports: ports(rule) }));
  const egress: EgressEntry[] = rules
    .filter((rule) => rule.direction === "egress")
    .map((rule) => ({ to: [peer(peerNamespace(rule, options))], ports: ports(rule) }));

  return {
    defaultDeny: {
      apiVersion: "networking.k8s.io/v1",
      kind: "NetworkPolicy",
      metadata: { name: "default-deny", namespace: NAMESPACE_REF },
      spec: {
        podSelector: {},
        policyTypes: [...types],
      },
    },
    allow: {
      apiVersion: "networking.k8s.io/v1",
      kind: "NetworkPolicy",
      metadata: { name: `${APP_NAME_REF}-allow`, namespace: NAMESPACE_REF },
      spec: {
        podSelector: { matchLabels: { app: APP_NAME_REF } },
        policyTypes: [...types],
        ingress,
        egress,
      },
    },
  };
}

function toDocument(policy: NetworkPolicy, comment: string): string {
  const doc = new Document(policy);
  doc.commentBefore = ` ${comment}`;
  return doc.toString({ lineWidth: 0 });
}

/**
 * Serialize both policies into one multi-document file, deny policy first
 */
export function renderNetworkPolicies(
  profile: Profile,
  options: NetworkPolicyOptions = {}
): string {
  const { defaultDeny, allow } = buildNetworkPolicies(profile, options);
  return [
    toDocument(defaultDeny, "Policy 1: Default Deny"),
    toDocument(allow, "Policy 2: Allow exceptions"),
  ].join("---\n");
}

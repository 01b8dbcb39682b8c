export {
  REGISTRY_PLACEHOLDER,
  RESOURCE_TEMPLATES,
  buildChartDescriptor,
  buildChartValues,
  imageTag,
  loadResourceTemplates,
  renderYaml,
  type ChartDescriptor,
  type ChartValues,
  type PullPolicy,
  type ResourceTemplate,
  type ServiceType,
} from "./chart.js";
export { isCI, resolveConfig, type Config, type ConfigOverrides } from "./config.js";
export { deploy } from "./deploy.js";
export { execForm, renderDockerfile, shellQuote } from "./dockerfile.js";
export { DeployError, DeployErrorCode, ProfileError, ProfileErrorCode } from "./errors.js";
export {
  DEFAULT_OUT_DIR,
  generate,
  renderArtifacts,
  writeArtifacts,
  type Artifact,
  type GenerateOptions,
  type GenerateResult,
} from "./generate.js";
export {
  NAMESPACE_NAME_LABEL,
  buildNetworkPolicies,
  policyTypes,
  renderNetworkPolicies,
  type NetworkPolicy,
  type NetworkPolicyOptions,
  type NetworkPolicySet,
  type PolicyType,
} from "./network-policy.js";
export {
  DEFAULT_PROFILE_PATH,
  KEEP_ALIVE_COMMAND,
  Profile,
  loadProfile,
  type Direction,
  type NetworkRule,
} from "./profile.js";
export { bindRegistry, validateUsername, type DeploymentTarget } from "./registry.js";

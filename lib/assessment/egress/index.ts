export {
  EgressPool,
  getEgressPool,
  releaseEgressPool,
  type EgressPoolEntry,
  type EgressPoolOptions,
} from "./pool";
export { EgressRotation } from "./rotation";
export {
  Ec2InstanceProvisioner,
  StaticProvisioner,
  createProvisioner,
  type EgressProvisioner,
} from "./provisioners";

// Query module
// Read-only permission questions answered by walking the membership graph.

export { QueryEngine, type QueryEngineOptions } from './engine.js';
export {
  walkMemberships,
  someMembership,
  forEachMembership,
  type MembershipVisitor,
} from './traversal.js';

export { ComponentSet } from "./component-set.js";
export type { ComponentData, ReadonlyComponentSet } from "./component-set.js";
export {
  ComponentSchemaRegistry,
  builtinComponentProvider,
  openComponentProvider,
} from "./registry.js";
export type { ComponentSchema, ComponentSchemaProvider } from "./registry.js";
export {
  ACTIVITIES,
  DIRECTIONS,
  EntityStateFlag,
  BUILTIN_COMPONENT_SCHEMAS,
  BUILTIN_KINDS,
  animationBlockSchema,
  animationLayerSchema,
  isBuiltinKind,
  parseBuiltinComponent,
} from "./schemas.js";
export type {
  Activity,
  AnimationBlock,
  AnimationLayer,
  BuiltinComponents,
  BuiltinKind,
  CharacterComponent,
  Direction,
  EntityStateFlagName,
  HealthComponent,
  InputComponent,
  ManaComponent,
  PhysicsComponent,
  PlayerComponent,
  PositionComponent,
  SpriteComponent,
  StateComponent,
  VelocityComponent,
} from "./schemas.js";

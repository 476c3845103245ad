export {
  createHostObject,
  bindClasses,
  toHostValue,
  fromHostValue,
  toSnakeCase,
  type HostObject,
  type HostObjectOptions,
  type ClassBinding,
} from "./hostObject";

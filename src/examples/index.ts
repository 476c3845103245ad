export { Person, type Say } from "./person";
export { Vehicle } from "./vehicle";

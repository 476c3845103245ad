export * from "./errors";
export * from "./tags";
export * from "./boxed";
export * from "./descriptors";
export * from "./registrar";
export * from "./registry";
export * from "./facade";
export * from "./validate";
export { generateMarkdown, generateJSON, type MarkdownOptions } from "./docgen";

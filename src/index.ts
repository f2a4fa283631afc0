export * from "./type";
export * from "./share";
export * from "./capabilities";
export { UndirectedGraph } from "./UndirectedGraph";

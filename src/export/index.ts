export * from "./exporter";
export * from "./serializers";

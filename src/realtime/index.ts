export * from "@/realtime/RealtimeAdapter";
export * from "@/realtime/MockAdapter";

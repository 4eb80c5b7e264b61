export * from "@/store/editorStore";

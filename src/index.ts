export * from "./logger";
export * from "./errors";
export * from "./health";
export * from "./time";
export * from "./address";
export * from "./wire";
export * from "./peer_directory";
export * from "./relay_hub";
export * from "./seen_cache";
export * from "./line_reader";
export * from "./connection_handler";
export * from "./handshake";
export * from "./listener";
export * from "./dialer";
export * from "./gossip_emitter";
export * from "./dedup_filter";
export * from "./config";
export * from "./mesh_node";

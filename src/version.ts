// This module centralizes server identity values so protocol metadata and routes stay in sync.

export const MCP_SERVER_NAME = 'locale-time-mcp';
export const MCP_SERVER_VERSION = '0.1.0';
export const MCP_PROTOCOL_VERSION = '2025-06-18';

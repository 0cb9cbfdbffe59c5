export { NodeFileHandle, NodeFileSystem } from "./node-filesystem.js";
export { NodeSocketFactory, NodeTcpSocket } from "./node-socket.js";

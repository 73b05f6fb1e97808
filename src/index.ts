export { ChessClient, type ChessClientOptions, type Connector } from "./client.js";
export { ClientSession, type ClientSessionOptions, type MessageSink } from "./session.js";
export { ResponseRouter, type ResponseRouterOptions } from "./router.js";
export { GameController, type CommandSender } from "./controller.js";
export { ClientContext, ClientState, type ClientStateSnapshot, type PlayerNumber } from "./state.js";
export {
    GameModel,
    describeMove,
    moveSuffix,
    terminalReason,
    turnForMove,
    PRIMARY_COLOR,
    SECONDARY_COLOR,
    type GameDataSnapshot,
    type MoveRecord,
    type TerminalReason,
} from "./model.js";
export {
    decodeServerEvent,
    serialize,
    toMoveRecord,
    isColor,
    type ClientCommand,
    type Color,
    type DecodeResult,
    type ServerEvent,
    type ServerEventType,
    type BoardData,
    type Strike,
} from "./protocol.js";
export { LineFramer, type LineFramerOptions } from "./framing.js";
export { uploadGameFile, splitChunks, type UploadOptions, type UploadResult } from "./upload.js";
export { loadConfig, ClientConfigSchema, DEFAULT_CONFIG, USAGE, type ClientConfig } from "./config.js";
export { createLogger, type ClientLogger, type LogLevel } from "./logger.js";
export { ChessClientError, ConnectionError, ConfigError, FramingError } from "./errors.js";
export { menuSnapshot, type MenuSnapshot, type UserCommand, type View } from "./view.js";
export { ConsoleView, formatMenu, parseInput } from "./views/console.js";
export { type Transport, type EndHandler } from "./transport/types.js";
export { createTransport, describeTarget, type TransportKind, type TransportTarget } from "./transport/factory.js";
export { TcpTransport, connectTcp } from "./transport/tcp.js";
export { UnixTransport, connectUnix } from "./transport/unix-socket.js";
export { InMemoryTransport, createMemoryTransportPair } from "./transport/memory.js";

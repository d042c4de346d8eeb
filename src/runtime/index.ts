export {DecodeError, NotLoadedError} from "../errors"
export * from "./rows"
export * from "./scan"

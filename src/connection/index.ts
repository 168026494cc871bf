export { Connection, type ConnectionOptions, type ConnectionState, type CursorResult } from './connection.js'
export { Cursor } from './cursor.js'
export { connect } from './connect.js'

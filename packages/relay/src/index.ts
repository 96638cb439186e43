export * from './errors'
export * from './diagnostics'
export * from './config'
export * from './transport/framer'
export * from './pdu/x224'
export * from './pdu/mcs'
export * from './pdu/gcc'
export * from './pdu/security'
export * from './pdu/share'
export * from './pdu/fast-path'
export * from './pdu/virtual-channel'
export * from './negotiation/states'
export * from './negotiation/messages'
export * from './negotiation/security-layer'
export * from './negotiation/engine'
export * from './negotiation/client-facing'
export * from './negotiation/server-facing'
export * from './channels/types'
export * from './channels/registry'
export * from './channels/multiplexer'
export * from './channels/handlers/cliprdr'
export * from './channels/handlers/rdpdr'
export * from './channels/handlers/drdynvc'
export * from './channels/handlers/io'
export * from './relay/hooks'
export * from './relay/session'
export * from './features/input'
export * from './features/credentials'
export * from './features/clipboard'
export * from './features/active-clipboard'
export * from './features/payload'
export {
  generateRsaKey,
  type RsaPrivateKey,
  type RsaPublicKey,
  rsaKeyFromPem,
} from './internal/crypto/rsa'

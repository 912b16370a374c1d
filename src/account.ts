import { PublicKey } from '@solana/web3.js'

const account = {
  /**
   * Validate an address
   * @param address Base58 string
   * @returns true/false
   */
  isAddress: (address: string | undefined): address is string => {
    if (!address) return false
    try {
      new PublicKey(address)
      return true
    } catch (er) {
      return false
    }
  },

  /**
   * Generate public key corresponding to the address
   * @param address Base58 string
   * @returns corresponding public key
   */
  fromAddress: (address: string): PublicKey | null => {
    if (!account.isAddress(address)) return null
    return new PublicKey(address)
  },

  /**
   * Same as fromAddress but throws on an invalid address
   * @param address Base58 string
   * @param name What the address stands for, used in the error message
   * @returns corresponding public key
   */
  toPublicKey: (address: string, name: string = 'address'): PublicKey => {
    const publicKey = account.fromAddress(address)
    if (!publicKey) throw new Error(`Invalid ${name}`)
    return publicKey
  },

  /**
   * Check whether a public key can be a program derived address (off the ed25519 curve)
   * @param publicKey
   * @returns true/false
   */
  isProgramAddress: (publicKey: PublicKey): boolean => {
    return !PublicKey.isOnCurve(publicKey.toBuffer())
  },
}

export default account

/**
 * RC4 keystream. One instance per direction; state carries across calls.
 */
export class Rc4 {
  #s = new Uint8Array(256)
  #i = 0
  #j = 0

  constructor(key: Uint8Array) {
    const s = this.#s
    for (let i = 0; i < 256; i += 1) {
      s[i] = i
    }
    let j = 0
    for (let i = 0; i < 256; i += 1) {
      const si = s[i] ?? 0
      j = (j + si + (key[i % key.length] ?? 0)) & 0xff
      s[i] = s[j] ?? 0
      s[j] = si
    }
  }

  process(input: Uint8Array): Uint8Array {
    const s = this.#s
    const out = new Uint8Array(input.length)
    let i = this.#i
    let j = this.#j
    for (let n = 0; n < input.length; n += 1) {
      i = (i + 1) & 0xff
      const si = s[i] ?? 0
      j = (j + si) & 0xff
      const sj = s[j] ?? 0
      s[i] = sj
      s[j] = si
      out[n] = (input[n] ?? 0) ^ (s[(si + sj) & 0xff] ?? 0)
    }
    this.#i = i
    this.#j = j
    return out
  }
}

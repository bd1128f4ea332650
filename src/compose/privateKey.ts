// nsec1 followed by the 58-character bech32 data part of a secret key.
const NSEC_PATTERN = /nsec1[02-9ac-hj-np-z]{58}/i

export const looksLikePrivateKey = (text: string): boolean => NSEC_PATTERN.test(text)

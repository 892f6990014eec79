export const NAME = 'dirhop'

export const plugin = {
  name: 'broken',
  rules: () => {
    throw new Error('rules unavailable')
  }
}

export const screenVersion = '1.2.0'

export * from './book'
export * from './shelf'
export * from './room'
export * from './catalog'
export * from './report'
export * from './remote'

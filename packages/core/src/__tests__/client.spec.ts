import { createClient } from '../client'

test('createClient', () => {
  let client = createClient('http://library.test/api')
  expect(client.defaults.baseURL).toBe('http://library.test/api')
  expect(client.defaults.headers['Content-Type']).toBe('application/json')

  client = createClient('http://library.test', {
    headers: { 'x-foo': 'bar' },
  })

  expect(client.defaults.headers['x-foo']).toBe('bar')

  client = createClient('http://library.test', {
    headers: { 'Content-Type': 'text/html' },
  })

  expect(client.defaults.headers['Content-Type']).toBe('application/json')

  client = createClient('http://library.test', { timeout: 2500 })
  expect(client.defaults.timeout).toBe(2500)
})

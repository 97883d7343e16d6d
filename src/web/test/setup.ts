import '@testing-library/jest-dom/vitest'
import { cleanup } from '@testing-library/react'
import { afterEach, vi } from 'vitest'

// Mock fetch so nothing leaves the process
vi.stubGlobal('fetch', vi.fn())

afterEach(() => {
  cleanup()
})

import { describe, it, expect } from 'vitest'
import { clamp, color } from './common.js'

describe('clamp', () => {
    it('should limit to the range', () => {
        expect(clamp(5, 0, 1)).toBe(1)
        expect(clamp(-5, 0, 1)).toBe(0)
        expect(clamp(0.25, 0, 1)).toBe(0.25)
    })
})

describe('color', () => {
    it('should format channels as bytes', () => {
        expect(color([1, 0, 0.5])).toBe('rgb(255,0,128)')
    })

    it('should clamp out of range channels', () => {
        expect(color([2, -1, 0])).toBe('rgb(255,0,0)')
    })
})

import { getEventListeners } from "node:events"

import { describe, expect, it } from "vitest"

import { EventChannel } from "../../src/events/event-channel.js"

describe("EventChannel", () => {
  it("delivers events to every subscriber in publish order", () => {
    const channel = new EventChannel<number>()
    const first: number[] = []
    const second: number[] = []
    channel.subscribe((event) => first.push(event))
    channel.subscribe((event) => second.push(event))

    channel.publish(1)
    channel.publish(2)

    expect(first).toEqual([1, 2])
    expect(second).toEqual([1, 2])
  })

  it("stops delivering after unsubscribe", () => {
    const channel = new EventChannel<string>()
    const seen: string[] = []
    const unsubscribe = channel.subscribe((event) => seen.push(event))

    channel.publish("a")
    unsubscribe()
    channel.publish("b")

    expect(seen).toEqual(["a"])
    expect(channel.subscriberCount).toBe(0)
  })

  it("isolates a throwing subscriber from the publisher and other subscribers", () => {
    const errors: unknown[] = []
    const channel = new EventChannel<string>({ onListenerError: (error) => errors.push(error) })
    const seen: string[] = []
    channel.subscribe(() => {
      throw new Error("listener broke")
    })
    channel.subscribe((event) => seen.push(event))

    expect(() => channel.publish("a")).not.toThrow()
    expect(seen).toEqual(["a"])
    expect(errors).toHaveLength(1)
    expect(errors[0]).toBeInstanceOf(Error)
  })

  it("publishes to nobody without error", () => {
    const channel = new EventChannel<number>()
    expect(() => channel.publish(1)).not.toThrow()
  })

  describe("stream", () => {
    it("yields buffered events and finishes after end", async () => {
      const channel = new EventChannel<number>()
      const stream = channel.stream()

      channel.publish(1)
      channel.publish(2)
      stream.end()
      channel.publish(3)

      const seen: number[] = []
      for await (const event of stream) {
        seen.push(event)
      }
      expect(seen).toEqual([1, 2])
      expect(channel.subscriberCount).toBe(0)
    })

    it("resolves a pending read when the next event arrives", async () => {
      const channel = new EventChannel<string>()
      const stream = channel.stream()

      const pending = stream.next()
      channel.publish("ready")

      expect(await pending).toEqual({ value: "ready", done: false })
    })

    it("drops the oldest events when the consumer falls behind", async () => {
      const channel = new EventChannel<number>()
      const stream = channel.stream({ bufferSize: 2 })

      channel.publish(1)
      channel.publish(2)
      channel.publish(3)
      channel.publish(4)

      expect(stream.dropped).toBe(2)
      expect(stream.buffered).toBe(2)
      expect(await stream.next()).toEqual({ value: 3, done: false })
      expect(await stream.next()).toEqual({ value: 4, done: false })
    })

    it("ends when the signal aborts", async () => {
      const channel = new EventChannel<number>()
      const controller = new AbortController()
      const stream = channel.stream({ signal: controller.signal })

      const pending = stream.next()
      controller.abort()

      expect(await pending).toEqual({ value: undefined, done: true })
      expect(channel.subscriberCount).toBe(0)
    })

    it("detaches when the consumer breaks out of the loop", async () => {
      const channel = new EventChannel<number>()
      const stream = channel.stream()
      channel.publish(1)
      channel.publish(2)

      for await (const event of stream) {
        expect(event).toBe(1)
        break
      }

      expect(channel.subscriberCount).toBe(0)
      expect(await stream.next()).toEqual({ value: undefined, done: true })
    })

    it("releases the abort signal when the consumer stops early", async () => {
      const channel = new EventChannel<number>()
      const controller = new AbortController()
      const stream = channel.stream({ signal: controller.signal })
      expect(getEventListeners(controller.signal, "abort")).toHaveLength(1)

      await stream.return()

      expect(getEventListeners(controller.signal, "abort")).toHaveLength(0)
      expect(channel.subscriberCount).toBe(0)
    })

    it("rejects a non-positive buffer size", () => {
      const channel = new EventChannel<number>()
      expect(() => channel.stream({ bufferSize: 0 })).toThrow(RangeError)
    })
  })
})

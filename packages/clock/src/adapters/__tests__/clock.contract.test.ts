import { describeClockContract } from "../../ports/__tests__/clock.contract"
import { FakeClock } from "../fake-clock"
import { SystemClock } from "../system-clock"

describeClockContract({ name: "SystemClock", make: () => new SystemClock() })

describeClockContract({ name: "FakeClock", make: () => new FakeClock(new Date()) })

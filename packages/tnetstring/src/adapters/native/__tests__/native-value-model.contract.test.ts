import { describeValueModelContract } from "../../../ports/__tests__/value-model.contract"
import { NativeValueModel } from "../native-value-model"

describeValueModelContract("native", () => new NativeValueModel(), {
  ",": "hello",
  "#": -42,
  "^": 0.25,
  "!": true,
  "~": null,
  "}": { k: [1] },
  "]": ["a", {}],
})

import {
  codecs,
  ConversionError,
  defineFields,
  Reflectable,
  type ValueCodec,
} from "../src/index.js";

export class Detail {
  static readonly fields = defineFields<Detail>()
    .leaf("a", codecs.int)
    .leaf("b", codecs.string)
    .build();

  // "<a>,<b>"
  static readonly codec: ValueCodec<Detail> = {
    toText: (detail) => `${detail.a},${detail.b}`,
    fromText(text) {
      const comma = text.indexOf(",");
      if (comma < 0) {
        throw new ConversionError(text, "expected <int>,<text>");
      }
      const detail = new Detail();
      detail.a = codecs.int.fromText(text.slice(0, comma));
      detail.b = text.slice(comma + 1);
      return detail;
    },
  };

  a = 0;
  b = "";
}

export class Sample extends Reflectable {
  static readonly fields = defineFields<Sample>().leaf("a", codecs.int).nested("d", Detail).build();

  a = 1;
  d = new Detail();
  nonreflectable = "nonreflectable";

  constructor(id: string) {
    super(id);
    this.d.a = 2;
    this.d.b = "hello";
  }
}

export class Gauge extends Reflectable {
  static readonly fields = defineFields<Gauge>()
    .leaf("level", codecs.number)
    .leaf("enabled", codecs.boolean)
    .leaf("mode", codecs.enumeration(["auto", "manual"]))
    .leaf("note", codecs.string)
    .build();

  level = 0.5;
  enabled = true;
  mode: "auto" | "manual" = "auto";
  note = "";

  constructor(id: string) {
    super(id);
  }
}

export class Frame {
  static readonly fields = defineFields<Frame>()
    .leaf("width", codecs.int)
    .nested("detail", Detail)
    .build();

  width = 640;
  detail = new Detail();
}

export class Rig extends Reflectable {
  static readonly fields = defineFields<Rig>()
    .leaf("serial", codecs.bigint)
    .nested("frame", Frame)
    .build();

  serial = 9007199254740993n;
  frame = new Frame();

  constructor(id: string) {
    super(id);
  }
}

export class Holder extends Reflectable {
  static readonly fields = defineFields<Holder>()
    .leaf("label", codecs.string)
    .nested("detail", Detail)
    .build();

  label = "holder";
  detail: Detail | null = null;

  constructor(id: string) {
    super(id);
  }
}

import { describe, it, expect } from "vitest";
import {
  checkLiveView,
  checkSectionLabels,
  componentStructureIssues,
  usesExternalTemplates,
} from "../src/analyzers/live-view.js";
import { defaultConfig } from "../src/config.js";
import { extractMissingSections } from "../src/violation.js";
import type { LiveViewSectionsConfig } from "../src/types.js";
import { readFixture } from "./helpers.js";

const config: LiveViewSectionsConfig = defaultConfig("/project").rules.live_view_sections;

const LEGACY_LIVE = [
  "defmodule DemoWeb.LegacyLive do",
  "  use Phoenix.LiveView",
  "",
  "  def render(assigns) do",
  '    Phoenix.View.render(DemoWeb.PageView, "legacy.html", assigns)',
  "  end",
  "end",
  "",
].join("\n");

const STATEFUL_COMPONENT = [
  "defmodule DemoWeb.CounterComponent do",
  "  use Phoenix.LiveComponent",
  '  @moduledoc """',
  "  Counter.",
  "",
  "  ## Props",
  "  - count",
  '  """',
  "",
  "  def render(assigns) do",
  "    assigns = assign(assigns, :x, 1)",
  '    ~H"""',
  "    <span><%= @count %></span>",
  '    """',
  "  end",
  "end",
  "",
].join("\n");

describe("checkSectionLabels", () => {
  it("reports every missing section in one violation", () => {
    const violations = checkSectionLabels("lib/demo_web/live/page_live.ex", readFixture("page_live.ex"), config);

    expect(violations).toEqual([
      {
        message:
          'LiveView missing labeled sections\n   Missing sections: ["LIFECYCLE CALLBACKS", "EVENT HANDLERS", "RENDERING"]',
        file: "lib/demo_web/live/page_live.ex",
        line: 4,
        level: "warning",
        rule: "live_view_sections",
      },
    ]);
  });

  it("points at the first missing label and names only missing sections", () => {
    const [violation] = checkSectionLabels("lib/partial_live.ex", readFixture("partial_live.ex"), config);

    expect(violation.line).toBe(9);
    expect(extractMissingSections(violation.message)).toEqual(["EVENT HANDLERS", "RENDERING"]);
  });

  it("accepts a fully labeled module", () => {
    expect(checkSectionLabels("lib/labeled_live.ex", readFixture("labeled_live.ex"), config)).toEqual([]);
  });

  it("is not fooled by label text in prose, markup or strings", () => {
    const [violation] = checkSectionLabels("lib/fp_live.ex", readFixture("false_positive_live.ex"), config);
    expect(extractMissingSections(violation.message)).toEqual(["LIFECYCLE CALLBACKS", "EVENT HANDLERS", "RENDERING"]);
    expect(violation.line).toBe(10);
  });

  it("asks for EVENT HANDLERS when the module only handles info messages", () => {
    const content = [
      "defmodule DemoWeb.ClockLive do",
      "  use Phoenix.LiveView",
      "  # LIFECYCLE CALLBACKS",
      "  def mount(_params, _session, socket), do: {:ok, socket}",
      "  def handle_info(:tick, socket), do: {:noreply, socket}",
      "  # RENDERING",
      '  def render(assigns), do: ~H"<p>tick</p>"',
      "end",
    ].join("\n");

    const [violation] = checkSectionLabels("lib/demo_web/live/clock_live.ex", content, config);
    expect(violation.message).toBe('LiveView missing labeled sections\n   Missing sections: ["EVENT HANDLERS"]');
    expect(violation.line).toBe(5);
  });

  it("uses the configured level", () => {
    const [violation] = checkSectionLabels("lib/page_live.ex", readFixture("page_live.ex"), {
      ...config,
      violation_level: "error",
    });
    expect(violation.level).toBe("error");
  });

  it("skips non-LiveView files", () => {
    expect(checkSectionLabels("lib/demo_web.ex", readFixture("page_live.ex"), config)).toEqual([]);
    expect(checkSectionLabels("assets/page_live.js", readFixture("page_live.ex"), config)).toEqual([]);
  });
});

describe("usesExternalTemplates", () => {
  it("detects view and template render calls", () => {
    expect(usesExternalTemplates(LEGACY_LIVE)).toBe(true);
    expect(usesExternalTemplates('    render(assigns, "index.html")')).toBe(true);
    expect(usesExternalTemplates("    render(assigns, :index)")).toBe(true);
  });

  it("ignores embedded templates", () => {
    expect(usesExternalTemplates(readFixture("page_live.ex"))).toBe(false);
  });
});

describe("componentStructureIssues", () => {
  it("flags undocumented props on a function component", () => {
    expect(componentStructureIssues(readFixture("menu_component.ex"))).toEqual([
      "Component props are not documented with @moduledoc or @doc",
    ]);
  });

  it("flags a stateful component without an update callback", () => {
    expect(componentStructureIssues(STATEFUL_COMPONENT)).toEqual([
      "Stateful component missing @impl true def update callback",
    ]);
  });

  it("ignores modules that are not components", () => {
    expect(componentStructureIssues(readFixture("page_live.ex"))).toEqual([]);
  });
});

describe("checkLiveView", () => {
  it("runs section, template and component checks in order", () => {
    const violations = checkLiveView("lib/demo_web/legacy_live.ex", LEGACY_LIVE, config);
    expect(violations.map((v) => v.message.split("\n")[0])).toEqual([
      "LiveView missing labeled sections",
      "LiveView uses external templates",
    ]);
    expect(violations[1].message).toBe(
      "LiveView uses external templates\n   LiveView components should use embedded HEEx templates instead of external template files",
    );
    expect(violations[1].line).toBeUndefined();
  });

  it("reports component issues after the section check", () => {
    const violations = checkLiveView("lib/demo_web/menu_component.ex", readFixture("menu_component.ex"), config);
    expect(violations.map((v) => v.message)).toEqual([
      'LiveView missing labeled sections\n   Missing sections: ["RENDERING"]',
      "LiveView component structure issue\n   Component props are not documented with @moduledoc or @doc",
    ]);
  });

  it("honors disabled checks", () => {
    const quiet: LiveViewSectionsConfig = {
      ...config,
      required: [],
      check_external_templates: false,
      check_component_structure: false,
    };
    expect(checkLiveView("lib/demo_web/legacy_live.ex", LEGACY_LIVE, quiet)).toEqual([]);
    expect(checkLiveView("lib/demo_web/menu_component.ex", readFixture("menu_component.ex"), quiet)).toEqual([]);
  });

  it("skips the web entry module", () => {
    expect(checkLiveView("lib/demo_web.ex", LEGACY_LIVE, config)).toEqual([]);
  });
});

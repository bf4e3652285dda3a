import { ScreenRegistry, Turtle } from "@sketchpad/core";
import { saveScreen } from "@sketchpad/node";

const screens = new ScreenRegistry({ width: 400, height: 400, delayMs: 0 });
const screen = screens.current();
screen.bgcolor("black");

const t = new Turtle(screens);
t.speed("fastest");
t.penSize(2);

const colors = ["red", "orange", "yellow", "green", "blue", "purple"];
for (let i = 0; i < 120; i++) {
  t.penColor(colors[i % colors.length] ?? "white");
  await t.forward(i * 1.5);
  await t.left(59);
}

t.teleport(0, -180);
t.color("white", "gold");
await t.fill(() => t.circle(20));
t.write("spiral", { align: "center", font: ["Arial", 14, "bold"] });
t.hideTurtle();

console.log(`wrote ${saveScreen(screen, process.argv[2] ?? "turtle-spiral.png")}`);

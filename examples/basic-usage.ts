import {
  EvalTree,
  ParseError,
  compile,
  createRandomSource,
  rollBasic,
  rollVerbose,
} from "../src/index";

const random = createRandomSource("example");

function basicRollExample() {
  console.log("=== Basic rolls ===");
  for (const expression of ["1d20+5", "4d6h3", "2d20l1", "3d6r1", "8d6t5"]) {
    console.log(`${expression.padEnd(10)} ${rollVerbose(expression, "normal", 0, random)}`);
  }
}

function modesExample() {
  console.log("\n=== Modes ===");
  const damage = compile("2d6+1d8", 3);
  console.log(`average  ${rollBasic(damage, "average")}`);
  console.log(`maximum  ${rollBasic(damage, "maximum")}`);
  console.log(`critical ${rollVerbose(damage, "critical", 0, random)}`);
}

function attackExample() {
  console.log("\n=== Attack ===");
  const attack = EvalTree.fromString("1d20+7");
  attack.evaluate(random);
  console.log(attack.verboseResult());
  if (attack.isCritical()) console.log("Natural 20!");
  else if (attack.isFail()) console.log("Natural 1...");

  const damage = EvalTree.fromString("1d8+4");
  const total = attack.isCritical() ? damage.critify() : damage;
  console.log(`damage: ${total.verboseResult(random)}`);
}

function errorExample() {
  console.log("\n=== Errors ===");
  try {
    rollBasic("2d6+(3");
  } catch (error) {
    if (!(error instanceof ParseError)) throw error;
    console.log(error.format());
  }
}

basicRollExample();
modesExample();
attackExample();
errorExample();

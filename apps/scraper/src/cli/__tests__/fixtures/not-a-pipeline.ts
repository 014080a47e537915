export default { stages: [] }
